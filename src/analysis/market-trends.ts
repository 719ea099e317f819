import { AnalysisOptions } from "../shared/types/domain.types";
import {
  FrequencyEntry,
  JobPostingInput,
  MarketTrends,
  SalaryBand,
} from "../shared/types/market-trends.types";
import { extractSkills } from "./extractors/requirements.extractor";
import { parseSalaryRange } from "./parsers/salary-range.parser";

const TOP_N = 10;
const BAND_ORDER: ReadonlyArray<SalaryBand["period"]> = ["month", "year", "unspecified"];

export function analyzeMarketTrends(
  jobs: ReadonlyArray<JobPostingInput>,
  options?: AnalysisOptions,
): MarketTrends {
  const skillCounts = new Map<string, number>();
  const companyCounts = new Map<string, number>();
  const salaryTotals = new Map<SalaryBand["period"], { count: number; min: number; max: number }>();

  for (const job of jobs) {
    for (const skill of extractSkills(job.description, options?.skillMatchMode)) {
      increment(skillCounts, skill);
    }

    const company = job.company?.trim();
    if (company) {
      increment(companyCounts, company);
    }

    if (job.salaryRange) {
      const parsed = parseSalaryRange(job.salaryRange);
      if (parsed.isValid && parsed.min !== null && parsed.max !== null) {
        const period = parsed.period ?? "unspecified";
        const totals = salaryTotals.get(period) ?? { count: 0, min: 0, max: 0 };
        salaryTotals.set(period, {
          count: totals.count + 1,
          min: totals.min + parsed.min,
          max: totals.max + parsed.max,
        });
      }
    }
  }

  return {
    topSkills: mostCommon(skillCounts, TOP_N),
    topCompanies: mostCommon(companyCounts, TOP_N),
    totalAnalyzed: jobs.length,
    salaryBands: BAND_ORDER.flatMap((period) => {
      const totals = salaryTotals.get(period);
      if (!totals) {
        return [];
      }
      return [
        {
          period,
          count: totals.count,
          averageMin: Math.round(totals.min / totals.count),
          averageMax: Math.round(totals.max / totals.count),
        },
      ];
    }),
  };
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Array.prototype.sort is stable, so equal counts keep first-seen order.
export function mostCommon(counts: ReadonlyMap<string, number>, limit: number): FrequencyEntry[] {
  return Array.from(counts, ([name, count]) => ({ name, count }))
    .sort((left, right) => right.count - left.count)
    .slice(0, limit);
}
