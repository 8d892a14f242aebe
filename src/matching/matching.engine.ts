import { Logger } from "../config/logger";
import { extractJobRequirements } from "../jobs/parsers/requirements.parser";
import { parseResume } from "../profiles/parsers/resume.parser";
import { ExtractionError } from "../shared/errors";
import { JobRequirements, MatchResult, ParsedResume } from "../shared/types/matching.types";
import { MatchScorer } from "./scoring/match-score";

export class MatchingEngine {
  constructor(
    private readonly scorer: MatchScorer,
    private readonly logger: Logger,
  ) {}

  isSemanticEnabled(): boolean {
    return this.scorer.isSemanticEnabled();
  }

  async match(resumeText: string, jobText: string): Promise<MatchResult> {
    const parsedResume = parseOrThrow("resume", () => parseResume(resumeText));
    const jobRequirements = parseOrThrow("job_description", () => extractJobRequirements(jobText));
    return this.score(parsedResume, jobRequirements);
  }

  async score(parsedResume: ParsedResume, jobRequirements: JobRequirements): Promise<MatchResult> {
    const experience = this.scorer.experienceMatch(
      parsedResume.experience,
      jobRequirements.requiredExperience,
    );
    const [skills, education] = await Promise.all([
      this.scorer.skillsMatch(parsedResume.skills, jobRequirements.requiredSkills),
      this.scorer.educationMatch(parsedResume.education, jobRequirements.requiredEducation),
    ]);
    const overall = this.scorer.overallScore(experience, skills, education);

    const result: MatchResult = {
      parsedResume,
      jobRequirements,
      scores: {
        experienceMatch: Math.trunc(experience),
        skillsMatch: Math.trunc(skills),
        educationMatch: Math.trunc(education),
        overallScore: overall,
      },
      semanticMatchingUsed: this.scorer.isSemanticEnabled(),
    };

    this.logger.info("Resume matched", {
      candidate: parsedResume.name,
      jobTitle: jobRequirements.title,
      ...result.scores,
      semanticMatchingUsed: result.semanticMatchingUsed,
    });
    return result;
  }
}

function parseOrThrow<T>(source: "resume" | "job_description", parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new ExtractionError(source, error);
  }
}
