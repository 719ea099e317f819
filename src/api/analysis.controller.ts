import { Request, Response, Router } from "express";
import { analyzeCompatibility, analyzeMarketTrends } from "../analysis/compatibility.engine";
import { Logger, LoggerContext, logContext } from "../config/logger";
import { rankJobs } from "../jobs/job-relevance";
import {
  analyzeResumeRequirements,
  generateCoverLetter,
  tailorResume,
} from "../resumes/resume-tailor";
import { SkillMatchMode } from "../shared/types/domain.types";
import {
  ParseResult,
  parseCompatibilityRequest,
  parseJobRelevanceRequest,
  parseMarketTrendsRequest,
  parseTailoredResumeRequest,
} from "./request.schemas";

export interface AnalysisControllerDeps {
  logger: Logger;
  skillMatchMode: SkillMatchMode;
  marketTrendsMaxJobs: number;
  now?: () => Date;
}

type Handler = (request: Request, response: Response) => void;

export interface AnalysisHandlers {
  compatibility: Handler;
  marketTrends: Handler;
  jobRelevance: Handler;
  tailoredResume: Handler;
}

export function createAnalysisHandlers(deps: AnalysisControllerDeps): AnalysisHandlers {
  const now = deps.now ?? (() => new Date());
  const options = { skillMatchMode: deps.skillMatchMode };

  function handle<T>(
    route: string,
    parse: (body: unknown) => ParseResult<T>,
    run: (input: T) => Record<string, unknown>,
    contextOf?: (input: T) => LoggerContext,
  ): Handler {
    return (request, response) => {
      const startedAt = Date.now();
      const parsed = parse(request.body);
      if (!parsed.ok) {
        logContext(deps.logger, "debug", "Rejected analysis request", {
          route,
          ok: false,
          error_code: parsed.error_code,
        });
        response.status(400).json({ ok: false, error: parsed.error_code });
        return;
      }

      try {
        const payload = run(parsed.data);
        logContext(deps.logger, "info", "Analysis request completed", {
          ...contextOf?.(parsed.data),
          route,
          ok: true,
          latency_ms: Date.now() - startedAt,
          skill_match_mode: deps.skillMatchMode,
        });
        response.status(200).json({ ok: true, ...payload });
      } catch (error) {
        logContext(
          deps.logger,
          "error",
          "Analysis request failed",
          { route, ok: false, error_code: "internal_error" },
          { error: error instanceof Error ? error.message : "Unknown error" },
        );
        response.status(500).json({ ok: false, error: "internal_error" });
      }
    };
  }

  return {
    compatibility: handle("compatibility", parseCompatibilityRequest, (input) => ({
      analysis: analyzeCompatibility(input.jobDescription, input.profile, options),
      analyzedAt: now().toISOString(),
    })),
    marketTrends: handle(
      "market_trends",
      (body) => parseMarketTrendsRequest(body, deps.marketTrendsMaxJobs),
      (input) => ({
        trends: analyzeMarketTrends(input.jobs, options),
        analyzedAt: now().toISOString(),
      }),
      (input) => ({ jobs_count: input.jobs.length }),
    ),
    jobRelevance: handle(
      "job_relevance",
      parseJobRelevanceRequest,
      (input) => {
        const jobs = rankJobs(input.jobs, input.skills, input.keywords);
        return { jobs, totalFound: jobs.length };
      },
      (input) => ({ jobs_count: input.jobs.length }),
    ),
    tailoredResume: handle("tailored_resume", parseTailoredResumeRequest, (input) => {
      const requirements = analyzeResumeRequirements(input.jobDescription, deps.skillMatchMode);
      const target = { jobTitle: input.jobTitle, companyName: input.companyName };
      return {
        tailoredResume: tailorResume(input.baseResume, requirements, target),
        coverLetter: generateCoverLetter({
          ...target,
          requirements,
          candidateName: input.candidateName,
        }),
        jobRequirements: requirements,
      };
    }),
  };
}

export function buildAnalysisController(deps: AnalysisControllerDeps): Router {
  const handlers = createAnalysisHandlers(deps);
  const router = Router();

  router.post("/compatibility", handlers.compatibility);
  router.post("/market-trends", handlers.marketTrends);
  router.post("/job-relevance", handlers.jobRelevance);
  router.post("/tailored-resume", handlers.tailoredResume);

  return router;
}
