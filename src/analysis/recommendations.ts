import {
  CandidateProfile,
  JobRequirements,
  Recommendation,
} from "../shared/types/domain.types";

const SKILLS_NAMED_IN_GAP = 3;
const READY_MAX_MISSING_SKILLS = 2;
const READY_EXPERIENCE_RATIO = 0.8;

export function buildRecommendations(
  requirements: JobRequirements,
  profile: CandidateProfile,
  missingSkills: ReadonlyArray<string>,
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (missingSkills.length > 0) {
    recommendations.push({
      type: "skill_gap",
      message: `Consider learning these skills: ${missingSkills.slice(0, SKILLS_NAMED_IN_GAP).join(", ")}`,
      priority: missingSkills.length > SKILLS_NAMED_IN_GAP ? "high" : "medium",
    });
  }

  if (profile.experienceYears < requirements.experienceYears) {
    recommendations.push({
      type: "experience_gap",
      message: `Gain ${requirements.experienceYears - profile.experienceYears} more years of experience`,
      priority: "medium",
    });
  }

  if (
    missingSkills.length <= READY_MAX_MISSING_SKILLS &&
    profile.experienceYears >= requirements.experienceYears * READY_EXPERIENCE_RATIO
  ) {
    recommendations.push({
      type: "ready_to_apply",
      message: "You're a strong candidate! Consider applying.",
      priority: "high",
    });
  }

  return recommendations;
}
