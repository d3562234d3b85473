import { createOpenAICompletionClient, type CompletionClient } from "./llm/completions.js";
import type { Logger } from "./logger.js";
import { JsonlTaskJournal, noopJournal, type TaskJournal } from "./tasks/audit.js";
import type { WorkerConfig } from "./tasks/config.js";
import { openTasksDb, type TasksDb } from "./tasks/db.js";
import { SqliteDeadLetterSink } from "./tasks/deadLetters.js";
import { SqliteAnswerStore } from "./tasks/handlers/answerStore.js";
import { buildHandlerRegistry } from "./tasks/handlers/index.js";
import { migrateTasksDb } from "./tasks/migrations.js";
import { ProgressChannel } from "./tasks/progress.js";
import { TaskQueue } from "./tasks/taskStore.js";
import { WorkerManager } from "./tasks/workerManager.js";

export interface Runtime {
  db: TasksDb;
  queue: TaskQueue;
  deadLetters: SqliteDeadLetterSink;
  progress: ProgressChannel;
  journal: TaskJournal;
  manager: WorkerManager;
  close(): void;
}

/**
 * Wire the queue, handlers and worker pool from configuration. Everything is
 * owned by the returned object; nothing is kept at module level.
 */
export function createRuntime(
  config: WorkerConfig,
  logger: Logger,
  overrides: { completions?: CompletionClient | null } = {}
): Runtime {
  const db = openTasksDb(config.dbPath);
  migrateTasksDb(db);

  const journal = config.eventsPath ? new JsonlTaskJournal(config.eventsPath, logger.child("[journal]")) : noopJournal;
  const deadLetters = new SqliteDeadLetterSink(db);
  const progress = new ProgressChannel({ logger: logger.child("[progress]") });

  const queue = new TaskQueue(db, {
    maxAttempts: config.maxAttempts,
    visibilityTimeoutMs: config.visibilityTimeoutMs,
    pollIntervalMs: config.claimPollMs,
    backoff: config.backoff,
    deadLetters,
    journal,
    logger: logger.child("[queue]"),
  });

  const completions =
    overrides.completions !== undefined
      ? overrides.completions
      : config.openai.apiKey
        ? createOpenAICompletionClient({ apiKey: config.openai.apiKey, model: config.openai.model })
        : null;

  const registry = buildHandlerRegistry({ answers: new SqliteAnswerStore(db), completions, logger });

  const manager = new WorkerManager({
    queue,
    registry,
    group: config.group,
    concurrency: config.concurrency,
    workerIdPrefix: config.workerIdPrefix,
    shutdownGraceMs: config.shutdownGraceMs,
    batchSize: config.claimBatchSize,
    blockMs: config.claimBlockMs,
    handlerTimeoutMs: config.handlerTimeoutMs,
    errorBackoffMs: config.errorBackoffMs,
    progress,
    journal,
    logger,
  });

  return {
    db,
    queue,
    deadLetters,
    progress,
    journal,
    manager,
    close() {
      progress.close();
      db.close();
    },
  };
}

/** Run `onSignal` once on the first SIGINT/SIGTERM. */
export function onShutdownSignal(logger: Logger, onSignal: () => Promise<void>): void {
  let triggered = false;
  const handler = (signal: NodeJS.Signals) => {
    if (triggered) return;
    triggered = true;
    logger.info(`received ${signal}, shutting down`);
    onSignal().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("shutdown failed", err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}
