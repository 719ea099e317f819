import { EducationLevel } from "../shared/types/domain.types";

export type ExperienceLevel = "entry" | "mid" | "senior";

export interface ResumeExperienceEntry {
  title: string;
  company: string;
  description: string;
}

export interface StructuredResume {
  summary: string;
  skills: string[];
  experience: ResumeExperienceEntry[];
  education: string[];
}

export type BaseResume = string | StructuredResume;

export interface ResumeJobRequirements {
  technicalSkills: string[];
  softSkills: string[];
  experienceLevel: ExperienceLevel;
  education: EducationLevel;
}

export interface TailoringTarget {
  jobTitle: string;
  companyName: string;
}

export interface TailoredResume extends StructuredResume {
  tailoredFor: TailoringTarget;
}

export interface CoverLetterInput extends TailoringTarget {
  requirements: ResumeJobRequirements;
  candidateName?: string;
}
