import fetch from "node-fetch";
import { LogLevel } from "./env";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type WebhookPoster = (url: string, text: string) => Promise<void>;

export interface WebhookSinkConfig {
  enabled: boolean;
  url?: string;
  minLevel: LogLevel;
  ratePerMinute: number;
  batchMs: number;
  post?: WebhookPoster;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
  webhook?: WebhookSinkConfig;
}

export interface LoggerContext {
  route?: string;
  latency_ms?: number;
  jobs_count?: number;
  skill_match_mode?: string;
  ok?: boolean;
  error_code?: string;
}

export interface SinkEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const sink = buildWebhookLogSink(options?.webhook);
  const minLevel = options?.minLevel ?? "debug";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!isAtLeast(level, minLevel)) {
      return;
    }
    const timestamp = new Date().toISOString();
    const payload: Record<string, unknown> = {
      timestamp,
      level,
      message,
    };
    if (meta) {
      payload.meta = meta;
    }
    write(`${JSON.stringify(payload)}\n`);
    sink?.enqueue({ level, message, meta, timestamp });
  };

  return {
    debug(message, meta) {
      log("debug", message, meta);
    },
    info(message, meta) {
      log("info", message, meta);
    },
    warn(message, meta) {
      log("warn", message, meta);
    },
    error(message, meta) {
      log("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };

  if (level === "debug") {
    logger.debug(message, meta);
    return;
  }
  if (level === "warn") {
    logger.warn(message, meta);
    return;
  }
  if (level === "error") {
    logger.error(message, meta);
    return;
  }
  logger.info(message, meta);
}

export const MIN_WEBHOOK_BATCH_MS = 250;
export const WEBHOOK_BATCH_SIZE = 5;
const RATE_WINDOW_MS = 60_000;
const MAX_WEBHOOK_TEXT = 3800;
const MAX_META_STRING = 500;
const SECRET_KEY_PATTERN = /token|secret|password|api_?key|authorization/i;

export interface WebhookLogSinkOptions {
  url: string;
  minLevel: LogLevel;
  ratePerMinute: number;
  batchMs: number;
  post?: WebhookPoster;
  now?: () => number;
  onDeliveryError?: (error: unknown) => void;
}

/**
 * Buffers log entries and posts them to a webhook in batches of
 * {@link WEBHOOK_BATCH_SIZE}, at most `ratePerMinute` posts in any rolling
 * minute. Entries over the rate stay queued for a later flush.
 */
export class WebhookLogSink {
  readonly batchMs: number;
  readonly ratePerMinute: number;
  private readonly pending: SinkEntry[] = [];
  private readonly postedAt: number[] = [];
  private timer: NodeJS.Timeout | undefined;
  private readonly post: WebhookPoster;
  private readonly now: () => number;
  private readonly onDeliveryError: (error: unknown) => void;

  constructor(private readonly options: WebhookLogSinkOptions) {
    this.batchMs = Math.max(MIN_WEBHOOK_BATCH_MS, Math.floor(options.batchMs));
    this.ratePerMinute = Math.max(1, Math.floor(options.ratePerMinute));
    this.post = options.post ?? postToWebhook;
    this.now = options.now ?? Date.now;
    this.onDeliveryError = options.onDeliveryError ?? reportDeliveryError;
  }

  get queued(): number {
    return this.pending.length;
  }

  enqueue(entry: SinkEntry): void {
    if (!isAtLeast(entry.level, this.options.minLevel)) {
      return;
    }
    this.pending.push(entry);
    this.schedule();
  }

  /** Sends one batch if the rate window allows it. Never rejects. */
  async flush(): Promise<void> {
    this.cancelTimer();
    if (this.pending.length === 0) {
      return;
    }
    if (!this.reserveSlot()) {
      this.schedule();
      return;
    }

    const batch = this.pending.splice(0, WEBHOOK_BATCH_SIZE);
    try {
      await this.post(this.options.url, formatLogBatch(batch));
    } catch (error) {
      this.onDeliveryError(error);
    }
    if (this.pending.length > 0) {
      this.schedule();
    }
  }

  close(): void {
    this.cancelTimer();
  }

  private schedule(): void {
    if (this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.flush();
    }, this.batchMs);
    this.timer.unref();
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private reserveSlot(): boolean {
    const now = this.now();
    while (this.postedAt.length > 0 && now - (this.postedAt[0] ?? now) >= RATE_WINDOW_MS) {
      this.postedAt.shift();
    }
    if (this.postedAt.length >= this.ratePerMinute) {
      return false;
    }
    this.postedAt.push(now);
    return true;
  }
}

function buildWebhookLogSink(config: WebhookSinkConfig | undefined): WebhookLogSink | undefined {
  const url = config?.enabled ? config.url?.trim() : undefined;
  if (!config || !url) {
    return undefined;
  }
  return new WebhookLogSink({
    url,
    minLevel: config.minLevel,
    ratePerMinute: config.ratePerMinute,
    batchMs: config.batchMs,
    post: config.post,
  });
}

function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

/** One line per entry: `<timestamp> <LEVEL> <message> <meta json>`. */
export function formatLogBatch(entries: ReadonlyArray<SinkEntry>): string {
  const text = entries
    .map((entry) => {
      const head = `${entry.timestamp} ${entry.level.toUpperCase()} ${entry.message}`;
      return entry.meta ? `${head} ${stringifyMeta(redactMeta(entry.meta))}` : head;
    })
    .join("\n");
  return text.length > MAX_WEBHOOK_TEXT ? `${text.slice(0, MAX_WEBHOOK_TEXT - 3)}...` : text;
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]): [string, unknown] => {
      if (SECRET_KEY_PATTERN.test(key)) {
        return [key, "[REDACTED]"];
      }
      if (typeof value === "string" && value.length > MAX_META_STRING) {
        return [key, `${value.slice(0, MAX_META_STRING)}...`];
      }
      return [key, value];
    }),
  );
}

function stringifyMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return "{\"meta\":\"[unserializable]\"}";
  }
}

function reportDeliveryError(error: unknown): void {
  process.stderr.write(
    `log webhook delivery failed: ${error instanceof Error ? error.message : "Unknown error"}\n`,
  );
}

async function postToWebhook(url: string, text: string): Promise<void> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: JSON.stringify({ text }),
  });
  if (!response.ok) {
    throw new Error(`log_webhook_send_failed_http_${response.status}`);
  }
}
