export type EducationLevel = "high_school" | "bachelors" | "masters" | "phd";

export type SkillMatchMode = "substring" | "word_boundary";

export type RecommendationType = "skill_gap" | "experience_gap" | "ready_to_apply";

export type RecommendationPriority = "low" | "medium" | "high";

export interface CandidateProfile {
  skills: ReadonlyArray<string>;
  experienceYears: number;
  /** `null` when the candidate's level could not be recognised. */
  education: EducationLevel | null;
}

export interface JobRequirements {
  skills: string[];
  experienceYears: number;
  education: EducationLevel;
}

export interface Recommendation {
  type: RecommendationType;
  message: string;
  priority: RecommendationPriority;
}

export interface DimensionScores {
  skillMatchScore: number;
  experienceMatchScore: number;
  educationMatchScore: number;
}

export interface ProfileMatch extends DimensionScores {
  matchingSkills: string[];
  missingSkills: string[];
}

export interface CompatibilityResult extends DimensionScores {
  overallScore: number;
  matchingSkills: string[];
  missingSkills: string[];
  recommendations: Recommendation[];
  requirements: JobRequirements;
}

export interface AnalysisOptions {
  skillMatchMode?: SkillMatchMode;
}
