import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadEnv } from "../../config/env";
import { MIN_WEBHOOK_BATCH_MS, WebhookLogSink } from "../../config/logger";

describe("loadEnv", () => {
  it("applies defaults", () => {
    assert.deepEqual(loadEnv({}), {
      nodeEnv: "development",
      debugMode: false,
      port: 3000,
      logLevel: "info",
      logWebhookEnabled: false,
      logWebhookUrl: undefined,
      logWebhookLevel: "warn",
      logWebhookRatePerMin: 20,
      logWebhookBatchMs: 2500,
      skillMatchMode: "substring",
      requestBodyLimit: "1mb",
      marketTrendsMaxJobs: 5000,
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({
      PORT: "8080",
      DEBUG_MODE: "yes",
      LOG_LEVEL: "WARN",
      SKILL_MATCH_MODE: "word_boundary",
      LOG_WEBHOOK_ENABLED: "true",
      LOG_WEBHOOK_URL: " https://logs.example.com/hook ",
      MARKET_TRENDS_MAX_JOBS: "50",
    });
    assert.equal(env.port, 8080);
    assert.equal(env.debugMode, true);
    assert.equal(env.logLevel, "warn");
    assert.equal(env.skillMatchMode, "word_boundary");
    assert.equal(env.logWebhookUrl, "https://logs.example.com/hook");
    assert.equal(env.marketTrendsMaxJobs, 50);
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadEnv({ PORT: "abc" }), /Invalid PORT value: abc/);
    assert.throws(() => loadEnv({ SKILL_MATCH_MODE: "fuzzy" }), /Invalid SKILL_MATCH_MODE value: fuzzy/);
    assert.throws(() => loadEnv({ DEBUG_MODE: "maybe" }), /Invalid boolean value: maybe/);
    assert.throws(
      () => loadEnv({ LOG_WEBHOOK_ENABLED: "true" }),
      /LOG_WEBHOOK_URL is required when LOG_WEBHOOK_ENABLED is true/,
    );
  });

  it("shares the webhook batch floor with the log sink", () => {
    assert.equal(loadEnv({ LOG_WEBHOOK_BATCH_MS: "250" }).logWebhookBatchMs, MIN_WEBHOOK_BATCH_MS);
    assert.throws(
      () => loadEnv({ LOG_WEBHOOK_BATCH_MS: "249" }),
      /Invalid LOG_WEBHOOK_BATCH_MS value: 249/,
    );

    const sink = new WebhookLogSink({
      url: "https://logs.example.com/hook",
      minLevel: "warn",
      ratePerMinute: 20,
      batchMs: loadEnv({ LOG_WEBHOOK_BATCH_MS: "250" }).logWebhookBatchMs,
    });
    assert.equal(sink.batchMs, 250);
  });
});
