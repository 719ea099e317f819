import {
  extractEducationLevel,
  extractExperienceYears,
  extractSkills,
  extractSoftSkills,
} from "../analysis/extractors/requirements.extractor";
import { SkillMatchMode } from "../shared/types/domain.types";
import {
  BaseResume,
  CoverLetterInput,
  ExperienceLevel,
  ResumeExperienceEntry,
  ResumeJobRequirements,
  StructuredResume,
  TailoredResume,
  TailoringTarget,
} from "./resume.types";

const PLAIN_SUMMARY_MAX = 200;

export function analyzeResumeRequirements(
  jobDescription: string,
  matchMode: SkillMatchMode = "substring",
): ResumeJobRequirements {
  return {
    technicalSkills: extractSkills(jobDescription, matchMode),
    softSkills: extractSoftSkills(jobDescription),
    experienceLevel: toExperienceLevel(extractExperienceYears(jobDescription)),
    education: extractEducationLevel(jobDescription),
  };
}

export function toExperienceLevel(requiredYears: number): ExperienceLevel {
  if (requiredYears <= 1) {
    return "entry";
  }
  if (requiredYears >= 5) {
    return "senior";
  }
  return "mid";
}

export function tailorResume(
  baseResume: BaseResume,
  requirements: ResumeJobRequirements,
  target: TailoringTarget,
): TailoredResume {
  const resume = toStructuredResume(baseResume);
  return {
    summary: tailorSummary(resume.summary, requirements.technicalSkills, target.jobTitle),
    skills: prioritizeSkills(resume.skills, requirements.technicalSkills),
    experience: resume.experience.map((entry) =>
      highlightExperience(entry, requirements.technicalSkills),
    ),
    education: [...resume.education],
    tailoredFor: { ...target },
  };
}

export function toStructuredResume(baseResume: BaseResume): StructuredResume {
  if (typeof baseResume !== "string") {
    return baseResume;
  }
  const text = baseResume.trim();
  return {
    summary: text.length > PLAIN_SUMMARY_MAX ? `${text.slice(0, PLAIN_SUMMARY_MAX)}...` : text,
    skills: [],
    experience: [],
    education: [],
  };
}

function tailorSummary(originalSummary: string, technicalSkills: string[], jobTitle: string): string {
  if (technicalSkills.length === 0) {
    return originalSummary;
  }
  return [
    `Experienced professional specializing in ${technicalSkills.slice(0, 5).join(", ")}.`,
    `Passionate about ${jobTitle.toLowerCase()} role with proven expertise in ${technicalSkills.slice(0, 3).join(", ")}.`,
    originalSummary,
  ]
    .filter(Boolean)
    .join(" ");
}

/** Job-relevant skills first; both groups keep the candidate's order. */
export function prioritizeSkills(candidateSkills: string[], technicalSkills: string[]): string[] {
  const required = new Set(technicalSkills.map((skill) => skill.toLowerCase()));
  const relevant = candidateSkills.filter((skill) => required.has(skill.toLowerCase()));
  const other = candidateSkills.filter((skill) => !required.has(skill.toLowerCase()));
  return [...relevant, ...other];
}

function highlightExperience(
  entry: ResumeExperienceEntry,
  technicalSkills: string[],
): ResumeExperienceEntry {
  if (technicalSkills.length === 0 || !entry.description) {
    return { ...entry };
  }
  // Longest first so "javascript" wins over "java" at the same position.
  const alternatives = [...technicalSkills]
    .sort((left, right) => right.length - left.length)
    .map((skill) => skill.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&"));
  const pattern = new RegExp(alternatives.join("|"), "g");
  return {
    ...entry,
    description: entry.description.replace(pattern, (found) => `**${found}**`),
  };
}

export function generateCoverLetter(input: CoverLetterInput): string {
  const skills = input.requirements.technicalSkills;
  const signature = input.candidateName?.trim() || "[Your Name]";

  const skillParagraphs =
    skills.length > 0
      ? [
          `With my background in ${skills.slice(0, 3).join(", ")}, I am confident that I would be`,
          "a valuable addition to your team.",
          "",
          `My experience with ${skills.slice(0, 5).join(", ")} aligns perfectly with your`,
          "requirements. I am particularly excited about the opportunity to contribute to",
        ]
      : ["", "I am particularly excited about the opportunity to contribute to"];

  return [
    "Dear Hiring Manager,",
    "",
    `I am writing to express my strong interest in the ${input.jobTitle} position at ${input.companyName}.`,
    ...skillParagraphs,
    `${input.companyName}'s mission and grow within your innovative environment.`,
    "",
    "I have attached my resume for your review and would welcome the opportunity to",
    "discuss how my skills and enthusiasm can benefit your team.",
    "",
    "Thank you for your consideration.",
    "",
    "Best regards,",
    signature,
  ].join("\n");
}
