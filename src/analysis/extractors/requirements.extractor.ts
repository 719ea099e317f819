import vocabulary from "../data/skill-vocabulary.json";
import {
  EducationLevel,
  JobRequirements,
  SkillMatchMode,
} from "../../shared/types/domain.types";

export const TECHNICAL_SKILLS: ReadonlyArray<string> = vocabulary.technical;
export const SOFT_SKILLS: ReadonlyArray<string> = vocabulary.soft;

export const DEFAULT_EXPERIENCE_YEARS = 2;

// Order matters: the first pattern with a match anywhere in the text wins.
const EXPERIENCE_PATTERNS: ReadonlyArray<RegExp> = [
  /(\d+)\+?\s*years?/,
  /(\d+)-\d+\s*years?/,
  /minimum\s*(\d+)\s*years?/,
  /at least\s*(\d+)\s*years?/,
];

const SENIORITY_FALLBACKS: ReadonlyArray<{ keywords: string[]; years: number }> = [
  { keywords: ["senior", "lead"], years: 5 },
  { keywords: ["mid", "intermediate"], years: 3 },
  { keywords: ["entry", "junior"], years: 1 },
];

const EDUCATION_KEYWORDS: ReadonlyArray<{ keywords: string[]; level: EducationLevel }> = [
  { keywords: ["phd", "doctorate"], level: "phd" },
  { keywords: ["master", "msc", "mba"], level: "masters" },
  { keywords: ["bachelor", "degree", "bsc"], level: "bachelors" },
];

export function extractRequirements(
  description: string,
  matchMode: SkillMatchMode = "substring",
): JobRequirements {
  const lower = description.toLowerCase();
  return {
    skills: findVocabularyTerms(lower, TECHNICAL_SKILLS, matchMode),
    experienceYears: extractExperienceYears(lower),
    education: extractEducationLevel(lower),
  };
}

export function extractSkills(description: string, matchMode: SkillMatchMode = "substring"): string[] {
  return findVocabularyTerms(description.toLowerCase(), TECHNICAL_SKILLS, matchMode);
}

export function extractSoftSkills(description: string): string[] {
  return findVocabularyTerms(description.toLowerCase(), SOFT_SKILLS, "substring");
}

export function extractExperienceYears(description: string): number {
  const lower = description.toLowerCase();

  for (const pattern of EXPERIENCE_PATTERNS) {
    const match = lower.match(pattern);
    if (match?.[1]) {
      return Number.parseInt(match[1], 10);
    }
  }

  for (const fallback of SENIORITY_FALLBACKS) {
    if (fallback.keywords.some((keyword) => lower.includes(keyword))) {
      return fallback.years;
    }
  }
  return DEFAULT_EXPERIENCE_YEARS;
}

export function extractEducationLevel(description: string): EducationLevel {
  const lower = description.toLowerCase();
  for (const entry of EDUCATION_KEYWORDS) {
    if (entry.keywords.some((keyword) => lower.includes(keyword))) {
      return entry.level;
    }
  }
  return "high_school";
}

/**
 * Returns the vocabulary terms present in `lowerText`, in vocabulary order.
 *
 * `substring` mode accepts a term anywhere in the text, so "go" is found inside
 * "mongodb". `word_boundary` mode requires the term not to be flanked by a
 * letter or digit.
 */
export function findVocabularyTerms(
  lowerText: string,
  terms: ReadonlyArray<string>,
  matchMode: SkillMatchMode,
): string[] {
  if (!lowerText) {
    return [];
  }
  return terms.filter((term) =>
    matchMode === "word_boundary" ? containsWord(lowerText, term) : lowerText.includes(term),
  );
}

function containsWord(lowerText: string, term: string): boolean {
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(term)}(?![a-z0-9])`);
  return pattern.test(lowerText);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
