import {
  CandidateProfile,
  EducationLevel,
  JobRequirements,
  ProfileMatch,
} from "../shared/types/domain.types";

const UNKNOWN_EDUCATION_RANK = 2;

export function matchProfile(requirements: JobRequirements, profile: CandidateProfile): ProfileMatch {
  const { matchingSkills, missingSkills } = partitionSkills(requirements.skills, profile.skills);

  return {
    skillMatchScore: scoreSkillMatch(requirements.skills, matchingSkills),
    experienceMatchScore: scoreExperienceMatch(requirements.experienceYears, profile.experienceYears),
    educationMatchScore: scoreEducationMatch(requirements.education, profile.education),
    matchingSkills,
    missingSkills,
  };
}

export function partitionSkills(
  requiredSkills: ReadonlyArray<string>,
  candidateSkills: ReadonlyArray<string>,
): { matchingSkills: string[]; missingSkills: string[] } {
  const owned = new Set(candidateSkills.map((skill) => skill.toLowerCase()));
  const matchingSkills: string[] = [];
  const missingSkills: string[] = [];
  for (const skill of requiredSkills) {
    if (owned.has(skill.toLowerCase())) {
      matchingSkills.push(skill);
    } else {
      missingSkills.push(skill);
    }
  }
  return { matchingSkills, missingSkills };
}

export function scoreSkillMatch(
  requiredSkills: ReadonlyArray<string>,
  matchingSkills: ReadonlyArray<string>,
): number {
  if (requiredSkills.length === 0) {
    return 100;
  }
  return Math.min(100, (matchingSkills.length / requiredSkills.length) * 100);
}

export function scoreExperienceMatch(requiredYears: number, candidateYears: number): number {
  if (candidateYears >= requiredYears) {
    return 100;
  }
  if (candidateYears >= requiredYears * 0.7) {
    return 80;
  }
  if (candidateYears >= requiredYears * 0.5) {
    return 60;
  }
  return 40;
}

export function scoreEducationMatch(
  required: EducationLevel | null,
  candidate: EducationLevel | null,
): number {
  const requiredRank = educationRank(required);
  const candidateRank = educationRank(candidate);
  if (candidateRank >= requiredRank) {
    return 100;
  }
  if (candidateRank === requiredRank - 1) {
    return 80;
  }
  return 60;
}

export function educationRank(level: EducationLevel | null): number {
  switch (level) {
    case "high_school":
      return 1;
    case "bachelors":
      return 2;
    case "masters":
      return 3;
    case "phd":
      return 4;
    default:
      return UNKNOWN_EDUCATION_RANK;
  }
}
