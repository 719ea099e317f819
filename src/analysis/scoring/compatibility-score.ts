import { DimensionScores } from "../../shared/types/domain.types";

export const SCORE_WEIGHTS = {
  skill: 0.5,
  experience: 0.3,
  education: 0.2,
} as const;

export function aggregateScore(
  skillMatchScore: number,
  experienceMatchScore: number,
  educationMatchScore: number,
): number {
  return round1(
    skillMatchScore * SCORE_WEIGHTS.skill +
      experienceMatchScore * SCORE_WEIGHTS.experience +
      educationMatchScore * SCORE_WEIGHTS.education,
  );
}

export function aggregateDimensions(scores: DimensionScores): number {
  return aggregateScore(scores.skillMatchScore, scores.experienceMatchScore, scores.educationMatchScore);
}

/** Scores are never negative, so `Math.round` rounds halves away from zero here. */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
