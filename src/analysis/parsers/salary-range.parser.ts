import { SalaryPeriod } from "../../shared/types/market-trends.types";

export interface ParsedSalaryRange {
  min: number | null;
  max: number | null;
  period: SalaryPeriod | null;
  isValid: boolean;
}

export function parseSalaryRange(text: string): ParsedSalaryRange {
  const raw = text.trim();
  if (!raw) {
    return invalidRange();
  }

  const normalized = raw.toLowerCase().replace(/(\d),(?=\d{3}\b)/g, "$1");
  const amounts = extractAmounts(normalized);
  if (amounts.length === 0) {
    return invalidRange();
  }

  return {
    min: Math.min(...amounts),
    max: Math.max(...amounts),
    period: parsePeriod(normalized),
    isValid: true,
  };
}

function extractAmounts(text: string): number[] {
  const results: number[] = [];
  const regex = /(\d+(?:\.\d+)?)(\s*k\b)?/g;
  for (const match of text.matchAll(regex)) {
    const numeric = Number(match[1] ?? "");
    if (!Number.isFinite(numeric) || numeric <= 0) {
      continue;
    }
    results.push(match[2] ? Math.round(numeric * 1000) : Math.round(numeric));
    if (results.length >= 2) {
      break;
    }
  }
  return results;
}

function parsePeriod(text: string): SalaryPeriod | null {
  if (
    /\bper\s+month\b/.test(text) ||
    /\bmonthly\b/.test(text) ||
    /\/\s*mo(nth)?\b/.test(text) ||
    /\bmonth\b/.test(text)
  ) {
    return "month";
  }
  if (
    /\bper\s+(year|annum)\b/.test(text) ||
    /\byearly\b/.test(text) ||
    /\bannually\b/.test(text) ||
    /\/\s*(year|yr)\b/.test(text) ||
    /\byear\b/.test(text)
  ) {
    return "year";
  }
  return null;
}

function invalidRange(): ParsedSalaryRange {
  return {
    min: null,
    max: null,
    period: null,
    isValid: false,
  };
}
