export interface ParsedResume {
  readonly name: string;
  readonly experience: readonly string[];
  readonly skills: readonly string[];
  readonly education: readonly string[];
}

export interface JobRequirements {
  readonly title: string;
  readonly requiredExperience: readonly string[];
  readonly requiredSkills: readonly string[];
  readonly requiredEducation: readonly string[];
}

export interface MatchScores {
  readonly experienceMatch: number;
  readonly skillsMatch: number;
  readonly educationMatch: number;
  readonly overallScore: number;
}

export interface MatchResult {
  readonly parsedResume: ParsedResume;
  readonly jobRequirements: JobRequirements;
  readonly scores: MatchScores;
  readonly semanticMatchingUsed: boolean;
}

export interface MatchResponseV1 {
  candidate_name: string;
  job_title: string;
  match_scores: {
    experience_match: number;
    skills_match: number;
    education_match: number;
    overall_score: number;
  };
  details: {
    parsed_resume: {
      name: string;
      experience: string[];
      skills: string[];
      education: string[];
    };
    job_requirements: {
      title: string;
      required_experience: string[];
      required_skills: string[];
      required_education: string[];
    };
    semantic_matching_used: boolean;
  };
}
