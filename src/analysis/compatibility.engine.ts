import {
  AnalysisOptions,
  CandidateProfile,
  CompatibilityResult,
} from "../shared/types/domain.types";
import { extractRequirements } from "./extractors/requirements.extractor";
import { matchProfile } from "./profile.matcher";
import { buildRecommendations } from "./recommendations";
import { aggregateDimensions, round1 } from "./scoring/compatibility-score";

export { analyzeMarketTrends } from "./market-trends";

export function analyzeCompatibility(
  jobDescriptionText: string,
  profile: CandidateProfile,
  options?: AnalysisOptions,
): CompatibilityResult {
  const requirements = extractRequirements(jobDescriptionText, options?.skillMatchMode);
  const match = matchProfile(requirements, profile);

  return {
    overallScore: aggregateDimensions(match),
    skillMatchScore: round1(match.skillMatchScore),
    experienceMatchScore: round1(match.experienceMatchScore),
    educationMatchScore: round1(match.educationMatchScore),
    matchingSkills: match.matchingSkills,
    missingSkills: match.missingSkills,
    recommendations: buildRecommendations(requirements, profile, match.missingSkills),
    requirements,
  };
}
