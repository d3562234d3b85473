import crypto from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { SqliteDeadLetterSink } from "../tasks/deadLetters.js";
import { QueueUnavailableError } from "../tasks/errors.js";
import type { ProgressChannel, ProgressUpdate } from "../tasks/progress.js";
import type { TaskQueue } from "../tasks/taskStore.js";
import type { TaskRecord } from "../tasks/types.js";

export interface ApiDeps {
  queue: TaskQueue;
  group: string;
  deadLetters: SqliteDeadLetterSink;
  progress: ProgressChannel;
  logger?: Logger;
  /** Requests per minute on /tasks; 0 disables the limiter. */
  enqueueRateLimit?: number;
  /**
   * How often an open event stream re-reads the task from the store. Workers in
   * another process publish nowhere this process can hear.
   */
  statusPollMs?: number;
}

const EnqueueBody = z.object({
  type: z.string().trim().min(1).max(128),
  payload: z.unknown().optional(),
  maxAttempts: z.number().int().min(1).max(50).optional(),
  delayMs: z.number().int().min(0).max(86_400_000).optional(),
});

const DeadLetterQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// ---------------------------------------------------------------------------
// Server-Sent Events
// ---------------------------------------------------------------------------
function writeEvent(res: Response, update: ProgressUpdate): void {
  res.write(`event: progress\ndata: ${JSON.stringify(update)}\n\n`);
}

// Closing update for a task whose own final update is not in this process
function finalFromRecord(task: TaskRecord): ProgressUpdate | null {
  if (task.status !== "completed" && task.status !== "dead-lettered") return null;
  return {
    taskId: task.id,
    stage: task.status,
    ...(task.status === "dead-lettered" && task.lastError ? { message: task.lastError } : {}),
    final: true,
    atMs: task.updatedAtMs,
  };
}

export function createApp(deps: ApiDeps): express.Express {
  const logger = deps.logger ?? silentLogger;
  const app = express();
  app.disable("x-powered-by");

  // Security headers
  app.use(helmet());

  // Task payloads are references to stored files, not the files themselves
  app.use(express.json({ limit: "64kb" }));

  // Request log (request id + timing)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const rid = crypto.randomUUID();
    const start = Date.now();
    res.on("finish", () => {
      logger.debug(
        JSON.stringify({ rid, method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start })
      );
    });
    next();
  });

  const statusPollMs = deps.statusPollMs ?? 1_000;
  const limit = deps.enqueueRateLimit ?? 120;
  if (limit > 0) {
    app.use(
      "/tasks",
      rateLimit({
        windowMs: 60_000,
        limit,
        standardHeaders: true,
        legacyHeaders: false,
      })
    );
  }

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------
  app.get("/healthz", (_req: Request, res: Response) => {
    res.status(200).json({ ok: true, group: deps.group, tasks: deps.queue.stats(deps.group) });
  });

  app.post("/tasks", (req: Request, res: Response) => {
    const parsed = EnqueueBody.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid task", issues: parsed.error.issues.map((i) => i.message) });
    }

    const { type, payload, maxAttempts, delayMs } = parsed.data;
    try {
      const id = deps.queue.enqueue(type, payload ?? null, { maxAttempts, delayMs });
      return res.status(202).json({ id });
    } catch (err) {
      if (err instanceof QueueUnavailableError) {
        logger.error("enqueue failed", err);
        return res.status(503).json({ error: "Task queue unavailable" });
      }
      throw err;
    }
  });

  app.get("/tasks/:id", (req: Request, res: Response) => {
    const task = deps.queue.getTask(req.params.id, deps.group);
    if (!task) return res.status(404).json({ error: "Task not found" });
    return res.status(200).json({
      ...task,
      progress: deps.progress.latestFor(task.id),
      deadLetter: task.status === "dead-lettered" ? deps.deadLetters.get(task.id, deps.group) : null,
    });
  });

  app.get("/tasks/:id/events", (req: Request, res: Response) => {
    const taskId = req.params.id;
    const task = deps.queue.getTask(taskId, deps.group);
    if (!task) return res.status(404).json({ error: "Task not found" });

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const last = deps.progress.latestFor(taskId);
    const closing = last?.final ? last : finalFromRecord(task);
    if (closing) {
      writeEvent(res, closing);
      return res.end();
    }
    if (last) writeEvent(res, last);

    let finished = false;
    const finish = () => {
      if (finished) return;
      finished = true;
      clearInterval(poll);
      unsubscribe();
    };

    const unsubscribe = deps.progress.subscribe(taskId, (update) => {
      if (finished) return;
      writeEvent(res, update);
      if (update.final) {
        finish();
        res.end();
      }
    });

    const poll = setInterval(() => {
      let current: TaskRecord | null;
      try {
        current = deps.queue.getTask(taskId, deps.group);
      } catch (err) {
        logger.warn(`status poll for ${taskId} failed`, err);
        return;
      }
      const update = current ? finalFromRecord(current) : null;
      if (!update || finished) return;
      finish();
      writeEvent(res, update);
      res.end();
    }, statusPollMs);

    req.on("close", finish);
    return undefined;
  });

  app.get("/dead-letters", (req: Request, res: Response) => {
    const parsed = DeadLetterQuery.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: "Invalid limit" });
    return res.status(200).json({
      total: deps.deadLetters.count(deps.group),
      entries: deps.deadLetters.list({ group: deps.group, limit: parsed.data.limit }),
    });
  });

  // Fallthrough error handler: never leak stack traces
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser reports malformed JSON as a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON" });
      return;
    }
    logger.error("request failed", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
