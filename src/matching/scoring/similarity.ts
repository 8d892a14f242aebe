export const STOP_WORDS: ReadonlySet<string> = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "with",
  "by",
]);

const WORD = /[\p{L}\p{N}_]+/gu;

export function tokenizeWords(text: string): Set<string> {
  return new Set(text.toLowerCase().match(WORD) ?? []);
}

/**
 * Share of the required keywords (stop words removed) that also appear in the resume items, 0 to 100.
 */
export function keywordSimilarity(
  resumeItems: readonly string[],
  requiredItems: readonly string[],
): number {
  if (resumeItems.length === 0 || requiredItems.length === 0) {
    return 0;
  }

  const resumeWords = withoutStopWords(tokenizeWords(resumeItems.join(" ")));
  const requiredWords = withoutStopWords(tokenizeWords(requiredItems.join(" ")));
  if (requiredWords.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const word of requiredWords) {
    if (resumeWords.has(word)) {
      overlap += 1;
    }
  }
  return Math.min(100, (overlap / requiredWords.size) * 100);
}

export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  if (left.length !== right.length) {
    throw new Error(`Vector length mismatch: ${left.length} vs ${right.length}`);
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Rounds to the nearest integer, ties to the even neighbour. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function withoutStopWords(words: Set<string>): Set<string> {
  const output = new Set<string>();
  for (const word of words) {
    if (!STOP_WORDS.has(word)) {
      output.add(word);
    }
  }
  return output;
}
