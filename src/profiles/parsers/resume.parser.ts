import { ParsedResume } from "../../shared/types/matching.types";
import { extractAliasedSection, SectionAliases } from "./section.parser";

export const UNKNOWN_CANDIDATE = "Unknown Candidate";

const NAME_SCAN_LINES = 5;
const NAME_MAX_TOKENS = 4;
const CONTACT_MARKERS = ["email", "phone", "address", "linkedin"];
const NAME_LINE = /^[A-Za-z\s.]+$/;
const NAME_LABEL = /Name\s*:\s*([^\n]+)/i;

export const EXPERIENCE_SECTION: SectionAliases = {
  keywords: ["experience", "work experience", "employment", "work history"],
  endKeywords: ["education", "skills", "projects", "achievements"],
};

export const SKILLS_SECTION: SectionAliases = {
  keywords: ["skills", "technical skills", "core competencies", "expertise"],
  endKeywords: ["experience", "education", "projects", "achievements"],
};

export const EDUCATION_SECTION: SectionAliases = {
  keywords: ["education", "academic background", "qualifications"],
  endKeywords: ["experience", "skills", "projects", "achievements"],
};

export function extractName(text: string): string {
  const headLines = text
    .trim()
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, NAME_SCAN_LINES);

  for (const line of headLines) {
    const lower = line.toLowerCase();
    if (CONTACT_MARKERS.some((marker) => lower.includes(marker))) {
      continue;
    }
    if (NAME_LINE.test(line) && line.split(/\s+/).length <= NAME_MAX_TOKENS) {
      return line;
    }
  }

  const labelled = text.match(NAME_LABEL);
  if (labelled?.[1]) {
    return labelled[1].trim();
  }

  return UNKNOWN_CANDIDATE;
}

export function parseResume(text: string): ParsedResume {
  return {
    name: extractName(text),
    experience: extractAliasedSection(text, EXPERIENCE_SECTION),
    skills: extractAliasedSection(text, SKILLS_SECTION),
    education: extractAliasedSection(text, EDUCATION_SECTION),
  };
}
