import { InvalidMatchResponseError } from "../shared/errors";
import { MatchResponseV1, MatchResult } from "../shared/types/matching.types";

export function toMatchResponse(result: MatchResult): MatchResponseV1 {
  const { parsedResume, jobRequirements, scores } = result;
  return {
    candidate_name: parsedResume.name,
    job_title: jobRequirements.title,
    match_scores: {
      experience_match: scores.experienceMatch,
      skills_match: scores.skillsMatch,
      education_match: scores.educationMatch,
      overall_score: scores.overallScore,
    },
    details: {
      parsed_resume: {
        name: parsedResume.name,
        experience: [...parsedResume.experience],
        skills: [...parsedResume.skills],
        education: [...parsedResume.education],
      },
      job_requirements: {
        title: jobRequirements.title,
        required_experience: [...jobRequirements.requiredExperience],
        required_skills: [...jobRequirements.requiredSkills],
        required_education: [...jobRequirements.requiredEducation],
      },
      semantic_matching_used: result.semanticMatchingUsed,
    },
  };
}

/** Validates a decoded response body and rebuilds the match result it describes. */
export function parseMatchResponse(raw: unknown): MatchResult {
  const source = readRecord(raw, "$");
  const scores = readRecord(source.match_scores, "match_scores");
  const details = readRecord(source.details, "details");
  const resume = readRecord(details.parsed_resume, "details.parsed_resume");
  const job = readRecord(details.job_requirements, "details.job_requirements");
  const semantic = details.semantic_matching_used;
  if (typeof semantic !== "boolean") {
    throw new InvalidMatchResponseError("details.semantic_matching_used");
  }

  return {
    parsedResume: {
      name: readString(resume.name, "details.parsed_resume.name"),
      experience: readStringArray(resume.experience, "details.parsed_resume.experience"),
      skills: readStringArray(resume.skills, "details.parsed_resume.skills"),
      education: readStringArray(resume.education, "details.parsed_resume.education"),
    },
    jobRequirements: {
      title: readString(job.title, "details.job_requirements.title"),
      requiredExperience: readStringArray(job.required_experience, "details.job_requirements.required_experience"),
      requiredSkills: readStringArray(job.required_skills, "details.job_requirements.required_skills"),
      requiredEducation: readStringArray(job.required_education, "details.job_requirements.required_education"),
    },
    scores: {
      experienceMatch: readScore(scores.experience_match, "match_scores.experience_match"),
      skillsMatch: readScore(scores.skills_match, "match_scores.skills_match"),
      educationMatch: readScore(scores.education_match, "match_scores.education_match"),
      overallScore: readScore(scores.overall_score, "match_scores.overall_score"),
    },
    semanticMatchingUsed: semantic,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new InvalidMatchResponseError(field);
  }
  return value;
}

function readString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new InvalidMatchResponseError(field);
  }
  return value;
}

function readStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new InvalidMatchResponseError(field);
  }
  return value;
}

function readScore(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidMatchResponseError(field);
  }
  return value;
}
