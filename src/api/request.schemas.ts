import { JobListing } from "../jobs/job-relevance";
import {
  BaseResume,
  ResumeExperienceEntry,
  StructuredResume,
} from "../resumes/resume.types";
import { CandidateProfile, EducationLevel } from "../shared/types/domain.types";
import { JobPostingInput } from "../shared/types/market-trends.types";

const DEFAULT_JOB_TITLE = "Software Developer";
const DEFAULT_COMPANY_NAME = "Target Company";

export type ParseResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: string;
    };

export interface CompatibilityRequest {
  jobDescription: string;
  profile: CandidateProfile;
}

export interface MarketTrendsRequest {
  jobs: JobPostingInput[];
}

export interface JobRelevanceRequest {
  jobs: JobListing[];
  skills: string[];
  keywords: string[];
}

export interface TailoredResumeRequest {
  jobDescription: string;
  baseResume: BaseResume;
  jobTitle: string;
  companyName: string;
  candidateName?: string;
}

export function parseCompatibilityRequest(body: unknown): ParseResult<CompatibilityRequest> {
  if (!isRecord(body)) {
    return fail("invalid_body");
  }
  if (typeof body.jobDescription !== "string") {
    return fail("invalid_job_description");
  }
  const profile = parseCandidateProfile(body.profile);
  if (!profile.ok) {
    return profile;
  }
  return {
    ok: true,
    data: {
      jobDescription: body.jobDescription,
      profile: profile.data,
    },
  };
}

export function parseCandidateProfile(raw: unknown): ParseResult<CandidateProfile> {
  if (!isRecord(raw)) {
    return fail("invalid_profile");
  }

  const skills = raw.skills === undefined ? [] : toStringList(raw.skills);
  if (!skills) {
    return fail("invalid_profile_skills");
  }

  const years = raw.experienceYears;
  if (typeof years !== "number" || !Number.isInteger(years) || years < 0) {
    return fail("invalid_experience_years");
  }

  if (raw.education !== undefined && raw.education !== null && typeof raw.education !== "string") {
    return fail("invalid_education");
  }

  return {
    ok: true,
    data: {
      skills: skills.map((skill) => skill.trim()).filter(Boolean),
      experienceYears: years,
      education: typeof raw.education === "string" ? parseEducationLevel(raw.education) : null,
    },
  };
}

export function parseEducationLevel(value: string): EducationLevel | null {
  const normalized = value.toLowerCase().replace(/[^a-z]/g, "");
  switch (normalized) {
    case "highschool":
    case "secondary":
      return "high_school";
    case "bachelor":
    case "bachelors":
    case "bsc":
    case "ba":
    case "bs":
      return "bachelors";
    case "master":
    case "masters":
    case "msc":
    case "ma":
    case "mba":
      return "masters";
    case "phd":
    case "doctorate":
      return "phd";
    default:
      return null;
  }
}

export function parseMarketTrendsRequest(
  body: unknown,
  maxJobs: number,
): ParseResult<MarketTrendsRequest> {
  if (!isRecord(body) || !Array.isArray(body.jobs)) {
    return fail("invalid_body");
  }
  if (body.jobs.length > maxJobs) {
    return fail("too_many_jobs");
  }

  const jobs: JobPostingInput[] = [];
  for (const item of body.jobs) {
    if (!isRecord(item) || typeof item.description !== "string") {
      return fail("invalid_job_posting");
    }
    const company = optionalString(item.company);
    const salaryRange = optionalString(item.salaryRange);
    if (company === false || salaryRange === false) {
      return fail("invalid_job_posting");
    }
    jobs.push({
      description: item.description,
      ...(company !== undefined ? { company } : {}),
      ...(salaryRange !== undefined ? { salaryRange } : {}),
    });
  }
  return { ok: true, data: { jobs } };
}

export function parseJobRelevanceRequest(body: unknown): ParseResult<JobRelevanceRequest> {
  if (!isRecord(body) || !Array.isArray(body.jobs)) {
    return fail("invalid_body");
  }
  const skills = toStringList(body.skills);
  if (!skills) {
    return fail("invalid_skills");
  }
  const keywords = parseKeywords(body.keywords);
  if (!keywords) {
    return fail("invalid_keywords");
  }

  const jobs: JobListing[] = [];
  for (const item of body.jobs) {
    if (!isRecord(item) || typeof item.title !== "string" || typeof item.description !== "string") {
      return fail("invalid_job_listing");
    }
    const listing: JobListing = { title: item.title, description: item.description };
    for (const key of ["company", "location", "url", "salaryRange"] as const) {
      const value = optionalString(item[key]);
      if (value === false) {
        return fail("invalid_job_listing");
      }
      if (value !== undefined) {
        listing[key] = value;
      }
    }
    jobs.push(listing);
  }
  return { ok: true, data: { jobs, skills, keywords } };
}

export function parseTailoredResumeRequest(body: unknown): ParseResult<TailoredResumeRequest> {
  if (!isRecord(body)) {
    return fail("invalid_body");
  }
  if (typeof body.jobDescription !== "string") {
    return fail("invalid_job_description");
  }
  const baseResume = parseBaseResume(body.baseResume);
  if (!baseResume) {
    return fail("invalid_base_resume");
  }
  const jobTitle = optionalString(body.jobTitle);
  const companyName = optionalString(body.companyName);
  const candidateName = optionalString(body.candidateName);
  if (jobTitle === false || companyName === false || candidateName === false) {
    return fail("invalid_body");
  }

  return {
    ok: true,
    data: {
      jobDescription: body.jobDescription,
      baseResume,
      jobTitle: jobTitle?.trim() || DEFAULT_JOB_TITLE,
      companyName: companyName?.trim() || DEFAULT_COMPANY_NAME,
      ...(candidateName !== undefined ? { candidateName } : {}),
    },
  };
}

function parseBaseResume(raw: unknown): BaseResume | null {
  if (typeof raw === "string") {
    return raw;
  }
  if (!isRecord(raw)) {
    return null;
  }
  const skills = raw.skills === undefined ? [] : toStringList(raw.skills);
  const education = raw.education === undefined ? [] : toStringList(raw.education);
  if (!skills || !education) {
    return null;
  }
  const experience: ResumeExperienceEntry[] = [];
  if (raw.experience !== undefined) {
    if (!Array.isArray(raw.experience)) {
      return null;
    }
    for (const item of raw.experience) {
      if (!isRecord(item)) {
        return null;
      }
      experience.push({
        title: toText(item.title),
        company: toText(item.company),
        description: toText(item.description),
      });
    }
  }
  const resume: StructuredResume = {
    summary: toText(raw.summary),
    skills,
    experience,
    education,
  };
  return resume;
}

function parseKeywords(raw: unknown): string[] | null {
  if (raw === undefined) {
    return [];
  }
  if (typeof raw === "string") {
    return raw.split(",");
  }
  return toStringList(raw);
}

function toStringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const output: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      return null;
    }
    output.push(item);
  }
  return output;
}

/** `undefined` when absent, `false` when present but not a string. */
function optionalString(value: unknown): string | undefined | false {
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === "string" ? value : false;
}

function toText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(error_code: string): { ok: false; error_code: string } {
  return { ok: false, error_code };
}
