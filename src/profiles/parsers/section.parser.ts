const LEADING_BULLETS = /^[-•*+\s]+/u;

export interface SectionAliases {
  keywords: readonly string[];
  endKeywords: readonly string[];
}

/**
 * Returns the item lines of the first section introduced by one of `sectionKeywords`.
 *
 * The section starts at the earliest keyword hit anywhere in the text (case-insensitive) and
 * ends at the earliest `endKeywords` hit after it, or at the end of the text. The header line is
 * dropped, and so is every line mentioning a keyword of either set.
 */
export function extractSection(
  text: string,
  sectionKeywords: readonly string[],
  endKeywords: readonly string[] = [],
): string[] {
  const lower = text.toLowerCase();
  const start = earliestIndex(lower, sectionKeywords, 0);
  if (start === -1) {
    return [];
  }

  const endHit = earliestIndex(lower, endKeywords, start + 1);
  const end = endHit === -1 ? text.length : endHit;

  const allKeywords = [...sectionKeywords, ...endKeywords].map((keyword) => keyword.toLowerCase());
  const items: string[] = [];
  for (const rawLine of text.slice(start, end).split("\n").slice(1)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const lowerLine = line.toLowerCase();
    if (allKeywords.some((keyword) => lowerLine.includes(keyword))) {
      continue;
    }
    const item = line.replace(LEADING_BULLETS, "");
    if (item) {
      items.push(item);
    }
  }
  return items;
}

export function extractAliasedSection(text: string, aliases: SectionAliases): string[] {
  return extractSection(text, aliases.keywords, aliases.endKeywords);
}

function earliestIndex(lowerText: string, keywords: readonly string[], fromIndex: number): number {
  let best = -1;
  for (const keyword of keywords) {
    const position = lowerText.indexOf(keyword.toLowerCase(), fromIndex);
    if (position !== -1 && (best === -1 || position < best)) {
      best = position;
    }
  }
  return best;
}
