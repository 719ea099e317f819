import express, { Express, NextFunction, Request, Response } from "express";
import { buildAnalysisController } from "./api/analysis.controller";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";

export interface AppContext {
  app: Express;
  logger: Logger;
}

export function createApp(env: EnvConfig): AppContext {
  const logger = createLogger({
    minLevel: env.debugMode ? "debug" : env.logLevel,
    webhook: {
      enabled: env.logWebhookEnabled,
      url: env.logWebhookUrl,
      minLevel: env.logWebhookLevel,
      ratePerMinute: env.logWebhookRatePerMin,
      batchMs: env.logWebhookBatchMs,
    },
  });
  const app = express();

  app.use(express.json({ limit: env.requestBodyLimit }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/api",
    buildAnalysisController({
      logger,
      skillMatchMode: env.skillMatchMode,
      marketTrendsMaxJobs: env.marketTrendsMaxJobs,
    }),
  );

  // express.json() reports malformed or oversized bodies through here.
  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    const status = readHttpStatus(error);
    if (status >= 500) {
      logger.error("Unhandled request error", {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      response.status(500).json({ ok: false, error: "internal_error" });
      return;
    }
    response.status(status).json({ ok: false, error: "invalid_body" });
  });

  return { app, logger };
}

function readHttpStatus(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}
