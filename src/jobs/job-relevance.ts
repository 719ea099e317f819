import { round1 } from "../analysis/scoring/compatibility-score";

const DESCRIPTION_HIT_POINTS = 10;
const TITLE_HIT_POINTS = 8;

export interface JobListing {
  title: string;
  description: string;
  company?: string;
  location?: string;
  url?: string;
  salaryRange?: string;
}

export type ScoredJobListing<T extends JobListing = JobListing> = T & {
  relevanceScore: number;
  matchingSkills: string[];
};

export function scoreJobRelevance<T extends JobListing>(
  job: T,
  skills: ReadonlyArray<string>,
): ScoredJobListing<T> {
  const description = job.description.toLowerCase();
  const title = job.title.toLowerCase();
  const maxScore = skills.length * DESCRIPTION_HIT_POINTS;

  let score = 0;
  for (const skill of skills) {
    const skillLower = skill.toLowerCase();
    if (description.includes(skillLower)) {
      score += DESCRIPTION_HIT_POINTS;
    } else if (title.includes(skillLower)) {
      score += TITLE_HIT_POINTS;
    }
  }

  return {
    ...job,
    relevanceScore: maxScore > 0 ? round1(Math.min(100, (score / maxScore) * 100)) : 0,
    matchingSkills: skills.filter((skill) => description.includes(skill.toLowerCase())),
  };
}

export function filterJobsByKeywords<T extends JobListing>(
  jobs: ReadonlyArray<T>,
  keywords: ReadonlyArray<string>,
): T[] {
  const normalizedKeywords = keywords
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length > 0);
  if (normalizedKeywords.length === 0) {
    return [...jobs];
  }
  return jobs.filter((job) => {
    const jobText = `${job.title} ${job.description}`.toLowerCase();
    return normalizedKeywords.some((keyword) => jobText.includes(keyword));
  });
}

export function rankJobs<T extends JobListing>(
  jobs: ReadonlyArray<T>,
  skills: ReadonlyArray<string>,
  keywords: ReadonlyArray<string> = [],
): Array<ScoredJobListing<T>> {
  return filterJobsByKeywords(jobs, keywords)
    .map((job) => scoreJobRelevance(job, skills))
    .sort((left, right) => right.relevanceScore - left.relevanceScore);
}
