import { z } from "zod";
import type { BackoffPolicy } from "./backoff.js";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "../logger.js";

export const DEFAULT_WORKER_CONCURRENCY = 4;
export const DEFAULT_VISIBILITY_TIMEOUT_MS = 300_000; // 5m, matches the orphan-claim window
export const DEFAULT_HANDLER_TIMEOUT_MS = 240_000;
export const DEFAULT_SHUTDOWN_GRACE_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_CLAIM_BLOCK_MS = 5_000;
export const DEFAULT_CLAIM_POLL_MS = 250;

const intFrom = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

// Empty strings in .env files count as "unset"
const emptyToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z
  .object({
    TASKS_DB_PATH: z.string().default(".data/tasks.db"),
    TASK_EVENTS_PATH: z.string().default(".data/task-events.jsonl"),
    TASK_GROUP: z.string().regex(/^[A-Za-z0-9_.:-]{1,64}$/).default("workers"),
    WORKER_CONCURRENCY: intFrom(DEFAULT_WORKER_CONCURRENCY, 1),
    WORKER_ID_PREFIX: z.string().optional(),
    CLAIM_BATCH_SIZE: intFrom(1, 1),
    CLAIM_BLOCK_MS: intFrom(DEFAULT_CLAIM_BLOCK_MS),
    CLAIM_POLL_MS: intFrom(DEFAULT_CLAIM_POLL_MS, 10),
    VISIBILITY_TIMEOUT_MS: intFrom(DEFAULT_VISIBILITY_TIMEOUT_MS, 1_000),
    HANDLER_TIMEOUT_MS: intFrom(DEFAULT_HANDLER_TIMEOUT_MS, 1),
    SHUTDOWN_GRACE_MS: intFrom(DEFAULT_SHUTDOWN_GRACE_MS),
    RETRY_MAX_ATTEMPTS: intFrom(DEFAULT_MAX_ATTEMPTS, 1),
    RETRY_BASE_MS: intFrom(5_000),
    RETRY_CAP_MS: intFrom(120_000),
    RETRY_JITTER_MS: intFrom(1_000),
    WORKER_ERROR_BACKOFF_MS: intFrom(1_000),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    PORT: intFrom(3000, 1),
    BIND_HOST: z.string().default("127.0.0.1"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  })
  .superRefine((env, ctx) => {
    if (env.HANDLER_TIMEOUT_MS >= env.VISIBILITY_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["HANDLER_TIMEOUT_MS"],
        message: "must be below VISIBILITY_TIMEOUT_MS so a live claim never expires mid-handler",
      });
    }
    if (env.RETRY_JITTER_MS > env.RETRY_BASE_MS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["RETRY_JITTER_MS"], message: "must not exceed RETRY_BASE_MS" });
    }
    if (env.RETRY_CAP_MS < env.RETRY_BASE_MS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["RETRY_CAP_MS"], message: "must be at least RETRY_BASE_MS" });
    }
  });

export interface WorkerConfig {
  dbPath: string;
  /** Null disables the task event journal. */
  eventsPath: string | null;
  group: string;
  concurrency: number;
  workerIdPrefix: string;
  claimBatchSize: number;
  claimBlockMs: number;
  claimPollMs: number;
  visibilityTimeoutMs: number;
  handlerTimeoutMs: number;
  shutdownGraceMs: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
  errorBackoffMs: number;
  logLevel: LogLevel;
  http: { port: number; host: string };
  openai: { apiKey: string | null; model: string };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const raw = Object.fromEntries(Object.entries(env).map(([k, v]) => [k, emptyToUndefined(v)]));
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`));
  }
  const e = parsed.data;

  return {
    dbPath: e.TASKS_DB_PATH,
    eventsPath: e.TASK_EVENTS_PATH.trim() === "-" ? null : e.TASK_EVENTS_PATH,
    group: e.TASK_GROUP,
    concurrency: e.WORKER_CONCURRENCY,
    workerIdPrefix: e.WORKER_ID_PREFIX ?? `worker-${process.pid}`,
    claimBatchSize: e.CLAIM_BATCH_SIZE,
    claimBlockMs: e.CLAIM_BLOCK_MS,
    claimPollMs: e.CLAIM_POLL_MS,
    visibilityTimeoutMs: e.VISIBILITY_TIMEOUT_MS,
    handlerTimeoutMs: e.HANDLER_TIMEOUT_MS,
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
    maxAttempts: e.RETRY_MAX_ATTEMPTS,
    backoff: { baseMs: e.RETRY_BASE_MS, capMs: e.RETRY_CAP_MS, jitterMs: e.RETRY_JITTER_MS },
    errorBackoffMs: e.WORKER_ERROR_BACKOFF_MS,
    logLevel: e.LOG_LEVEL,
    http: { port: e.PORT, host: e.BIND_HOST },
    openai: { apiKey: e.OPENAI_API_KEY ?? null, model: e.OPENAI_MODEL },
  };
}
