export type SalaryPeriod = "month" | "year";

export interface JobPostingInput {
  description: string;
  company?: string;
  salaryRange?: string;
}

export interface FrequencyEntry {
  name: string;
  count: number;
}

export interface SalaryBand {
  period: SalaryPeriod | "unspecified";
  count: number;
  averageMin: number;
  averageMax: number;
}

export interface MarketTrends {
  topSkills: FrequencyEntry[];
  topCompanies: FrequencyEntry[];
  totalAnalyzed: number;
  salaryBands: SalaryBand[];
}
