import type { z } from "zod";
import type { Logger } from "../logger.js";
import { HandlerRegistrationError } from "./errors.js";
import type { ProgressInput } from "./progress.js";

export type Outcome =
  | { kind: "success" }
  | { kind: "retryable-failure"; reason: string }
  | { kind: "fatal-failure"; reason: string };

export const succeed = (): Outcome => ({ kind: "success" });
export const retryLater = (reason: string): Outcome => ({ kind: "retryable-failure", reason });
export const failFatally = (reason: string): Outcome => ({ kind: "fatal-failure", reason });

export interface HandlerContext {
  taskId: string;
  taskType: string;
  /** Retryable failures seen so far; 0 on first delivery. */
  attempt: number;
  workerId: string;
  /** Aborted when the processing budget runs out or the worker is abandoned. */
  signal: AbortSignal;
  reportProgress(update: ProgressInput): void;
  logger: Logger;
}

/**
 * One task type's processing logic. Throwing is treated as a retryable
 * "handler fault"; return `failFatally` for input that will never succeed.
 */
export interface TaskHandler {
  /** Overrides the worker's default processing budget. */
  timeoutMs?: number;
  process(payload: unknown, ctx: HandlerContext): Promise<Outcome>;
}

/** Wrap a typed handler body with payload validation; invalid payloads are fatal. */
export function defineHandler<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fn: (payload: T, ctx: HandlerContext) => Promise<Outcome>,
  opts: { timeoutMs?: number } = {}
): TaskHandler {
  return {
    timeoutMs: opts.timeoutMs,
    async process(payload, ctx) {
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "payload"}: ${i.message}`).join("; ");
        return failFatally(`invalid payload: ${detail}`);
      }
      return fn(parsed.data, ctx);
    },
  };
}

export interface HandlerRegistry {
  resolve(taskType: string): TaskHandler | undefined;
  types(): string[];
}

/**
 * Build the closed type -> handler table. The table cannot change after this
 * call; unknown types always resolve to undefined.
 */
export function createHandlerRegistry(entries: ReadonlyArray<readonly [string, TaskHandler]>): HandlerRegistry {
  const table = new Map<string, TaskHandler>();

  for (const [taskType, handler] of entries) {
    if (table.has(taskType)) throw new HandlerRegistrationError(taskType);
    table.set(taskType, handler);
  }

  const types = Object.freeze([...table.keys()].sort());
  return Object.freeze({
    resolve: (taskType: string) => table.get(taskType),
    types: () => [...types],
  });
}
