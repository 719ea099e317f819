import dotenv from "dotenv";
import { SkillMatchMode } from "../shared/types/domain.types";
import { MIN_WEBHOOK_BATCH_MS } from "./logger";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EnvConfig {
  nodeEnv: string;
  debugMode: boolean;
  port: number;
  logLevel: LogLevel;
  logWebhookEnabled: boolean;
  logWebhookUrl?: string;
  logWebhookLevel: LogLevel;
  logWebhookRatePerMin: number;
  logWebhookBatchMs: number;
  skillMatchMode: SkillMatchMode;
  requestBodyLimit: string;
  marketTrendsMaxJobs: number;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const debugModeRaw = source.DEBUG_MODE ?? "false";
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logWebhookEnabledRaw = source.LOG_WEBHOOK_ENABLED ?? "false";
  const logWebhookLevelRaw = (source.LOG_WEBHOOK_LEVEL ?? "warn").trim().toLowerCase();
  const logWebhookRatePerMinRaw = source.LOG_WEBHOOK_RATE_PER_MIN ?? "20";
  const logWebhookBatchMsRaw = source.LOG_WEBHOOK_BATCH_MS ?? "2500";
  const skillMatchModeRaw = (source.SKILL_MATCH_MODE ?? "substring").trim().toLowerCase();
  const marketTrendsMaxJobsRaw = source.MARKET_TRENDS_MAX_JOBS ?? "5000";
  const logWebhookRatePerMin = Number(logWebhookRatePerMinRaw);
  const logWebhookBatchMs = Number(logWebhookBatchMsRaw);
  const marketTrendsMaxJobs = Number(marketTrendsMaxJobsRaw);
  const logWebhookEnabled = parseBoolean(logWebhookEnabledRaw);
  const logWebhookUrl = getOptionalTrimmed(source, "LOG_WEBHOOK_URL");

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(logWebhookRatePerMin) || logWebhookRatePerMin < 1) {
    throw new Error(`Invalid LOG_WEBHOOK_RATE_PER_MIN value: ${logWebhookRatePerMinRaw}`);
  }
  if (!Number.isFinite(logWebhookBatchMs) || logWebhookBatchMs < MIN_WEBHOOK_BATCH_MS) {
    throw new Error(`Invalid LOG_WEBHOOK_BATCH_MS value: ${logWebhookBatchMsRaw}`);
  }
  if (!Number.isInteger(marketTrendsMaxJobs) || marketTrendsMaxJobs < 1) {
    throw new Error(`Invalid MARKET_TRENDS_MAX_JOBS value: ${marketTrendsMaxJobsRaw}`);
  }
  if (logWebhookEnabled && !logWebhookUrl) {
    throw new Error("LOG_WEBHOOK_URL is required when LOG_WEBHOOK_ENABLED is true");
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    debugMode: parseBoolean(debugModeRaw),
    port,
    logLevel: parseLogLevel("LOG_LEVEL", logLevelRaw),
    logWebhookEnabled,
    logWebhookUrl,
    logWebhookLevel: parseLogLevel("LOG_WEBHOOK_LEVEL", logWebhookLevelRaw),
    logWebhookRatePerMin,
    logWebhookBatchMs,
    skillMatchMode: parseSkillMatchMode(skillMatchModeRaw),
    requestBodyLimit: getOptionalTrimmed(source, "REQUEST_BODY_LIMIT") ?? "1mb",
    marketTrendsMaxJobs,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(name: string, value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid ${name} value: ${value}`);
}

function parseSkillMatchMode(value: string): SkillMatchMode {
  if (value === "substring" || value === "word_boundary") {
    return value;
  }
  throw new Error(`Invalid SKILL_MATCH_MODE value: ${value}`);
}
