import { JobRequirements } from "../../shared/types/matching.types";

export const DEFAULT_JOB_TITLE = "Job Position";

const TITLE_PATTERN = /(role|position|title)\s*:\s*([^\n]+)/i;

// Order matters: results are concatenated pattern by pattern.
const EXPERIENCE_PATTERNS: readonly RegExp[] = [
  /(\d+)\+?\s*years?\s*(of\s*)?experience/gi,
  /experience\s*:\s*([^\n]+)/gi,
  /minimum\s*(\d+)\s*years?/gi,
];

// With the i flag, `\n[A-Z]` stops at any line starting with a letter.
const SKILLS_BLOCK = /(skills|required|tools|technologies)\s*:(.+?)(?=\n\n|\n[A-Z]|$)/is;
const SKILL_SEPARATORS = /[,;\n\-•*]+/;

const EDUCATION_PATTERNS: readonly RegExp[] = [
  /(bachelor|master|phd|degree)\s*[^\n]*?(in\s*[^\n]+?)(?=[,\n.]|$)/gi,
  /education\s*:\s*([^\n]+)/gi,
];

export function extractJobTitle(text: string): string {
  const title = text.match(TITLE_PATTERN)?.[2];
  return title === undefined ? DEFAULT_JOB_TITLE : title.trim();
}

export function extractRequiredSkills(text: string): string[] {
  const block = text.match(SKILLS_BLOCK)?.[2];
  if (block === undefined) {
    return [];
  }
  return block
    .split(SKILL_SEPARATORS)
    .map((skill) => skill.trim())
    .filter((skill) => skill.length > 0);
}

export function extractJobRequirements(text: string): JobRequirements {
  return {
    title: extractJobTitle(text),
    requiredExperience: collectMatches(text, EXPERIENCE_PATTERNS),
    requiredSkills: extractRequiredSkills(text),
    requiredEducation: collectMatches(text, EDUCATION_PATTERNS),
  };
}

function collectMatches(text: string, patterns: readonly RegExp[]): string[] {
  const results: string[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const joined = match
        .slice(1)
        .filter((group): group is string => Boolean(group))
        .join(" ");
      results.push(joined.trim());
    }
  }
  return results;
}
