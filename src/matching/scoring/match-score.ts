import { EmbeddingCapability } from "../../ai/embeddings.capability";
import { errorMessage, Logger } from "../../config/logger";
import { cosineSimilarity, keywordSimilarity, roundHalfEven } from "./similarity";

export const SKILLS_WEIGHT = 0.5;
export const EXPERIENCE_WEIGHT = 0.3;
export const EDUCATION_WEIGHT = 0.2;

export const SKILLS_SEMANTIC_BLEND = 0.7;
export const SKILLS_KEYWORD_BLEND = 0.3;
export const EDUCATION_SEMANTIC_BLEND = 0.6;
export const EDUCATION_KEYWORD_BLEND = 0.4;

// Experience: reward factor when the requirement is met, partial-credit factor when it is not.
export const EXPERIENCE_MET_FACTOR = 85;
export const EXPERIENCE_SHORT_FACTOR = 70;

// Neutral score when the job states no usable requirement.
export const NO_REQUIREMENT_SCORE = 50;

const RESUME_YEARS = /(\d+)\s*years?/gi;
const FIRST_NUMBER = /\d+/;

export type SemanticSimilarityResult =
  | { ok: true; score: number }
  | { ok: false; errorCode: "capability_unavailable" | "empty_input" | "embedding_failed"; message?: string };

export class MatchScorer {
  constructor(
    private readonly embeddings: EmbeddingCapability | null,
    private readonly logger: Logger,
  ) {}

  isSemanticEnabled(): boolean {
    return this.embeddings !== null;
  }

  async semanticSimilarity(
    resumeItems: readonly string[],
    requiredItems: readonly string[],
  ): Promise<SemanticSimilarityResult> {
    if (!this.embeddings) {
      return { ok: false, errorCode: "capability_unavailable" };
    }
    if (resumeItems.length === 0 || requiredItems.length === 0) {
      return { ok: false, errorCode: "empty_input" };
    }

    try {
      const [resumeVector, requiredVector] = await Promise.all([
        this.embeddings.encode(resumeItems.join(" ")),
        this.embeddings.encode(requiredItems.join(" ")),
      ]);
      const similarity = cosineSimilarity(resumeVector, requiredVector);
      // NaN components in a vector propagate through the cosine.
      if (!Number.isFinite(similarity)) {
        return { ok: true, score: 0 };
      }
      return { ok: true, score: Math.max(0, similarity * 100) };
    } catch (error) {
      return { ok: false, errorCode: "embedding_failed", message: errorMessage(error) };
    }
  }

  async skillsMatch(resumeSkills: readonly string[], requiredSkills: readonly string[]): Promise<number> {
    if (resumeSkills.length === 0 || requiredSkills.length === 0) {
      return 0;
    }
    const keyword = keywordSimilarity(resumeSkills, requiredSkills);
    if (!this.isSemanticEnabled()) {
      return keyword;
    }
    const semantic = await this.semanticScore(resumeSkills, requiredSkills, "skills");
    return semantic * SKILLS_SEMANTIC_BLEND + keyword * SKILLS_KEYWORD_BLEND;
  }

  async educationMatch(
    resumeEducation: readonly string[],
    requiredEducation: readonly string[],
  ): Promise<number> {
    if (resumeEducation.length === 0) {
      return 0;
    }
    if (requiredEducation.length === 0) {
      return NO_REQUIREMENT_SCORE;
    }
    const keyword = keywordSimilarity(resumeEducation, requiredEducation);
    if (!this.isSemanticEnabled()) {
      return keyword;
    }
    const semantic = await this.semanticScore(resumeEducation, requiredEducation, "education");
    return semantic * EDUCATION_SEMANTIC_BLEND + keyword * EDUCATION_KEYWORD_BLEND;
  }

  experienceMatch(resumeExperience: readonly string[], requiredExperience: readonly string[]): number {
    if (resumeExperience.length === 0) {
      return 0;
    }

    const resumeYears = sumResumeYears(resumeExperience);
    const requiredYears = maxRequiredYears(requiredExperience);
    if (requiredYears === 0) {
      return NO_REQUIREMENT_SCORE;
    }

    const ratio = resumeYears / requiredYears;
    if (resumeYears >= requiredYears) {
      return Math.min(100, ratio * EXPERIENCE_MET_FACTOR);
    }
    return ratio * EXPERIENCE_SHORT_FACTOR;
  }

  overallScore(experience: number, skills: number, education: number): number {
    return roundHalfEven(
      skills * SKILLS_WEIGHT + experience * EXPERIENCE_WEIGHT + education * EDUCATION_WEIGHT,
    );
  }

  private async semanticScore(
    resumeItems: readonly string[],
    requiredItems: readonly string[],
    field: "skills" | "education",
  ): Promise<number> {
    const result = await this.semanticSimilarity(resumeItems, requiredItems);
    if (result.ok) {
      return result.score;
    }
    if (result.errorCode === "embedding_failed") {
      this.logger.warn("Semantic similarity failed, semantic contribution set to 0", {
        field,
        error: result.message,
      });
    }
    return 0;
  }
}

export function sumResumeYears(resumeExperience: readonly string[]): number {
  let total = 0;
  for (const item of resumeExperience) {
    for (const match of item.matchAll(RESUME_YEARS)) {
      total += Number(match[1]);
    }
  }
  return total;
}

export function maxRequiredYears(requiredExperience: readonly string[]): number {
  let required = 0;
  for (const item of requiredExperience) {
    const first = item.match(FIRST_NUMBER);
    if (first) {
      required = Math.max(required, Number(first[0]));
    }
  }
  return required;
}
