import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { TaskJournal } from "./audit.js";
import { DEFAULT_SHUTDOWN_GRACE_MS, DEFAULT_WORKER_CONCURRENCY } from "./config.js";
import type { HandlerRegistry } from "./handlerRegistry.js";
import type { ProgressChannel } from "./progress.js";
import { sleep } from "./sleep.js";
import type { TaskQueue } from "./taskStore.js";
import { Worker } from "./worker.js";

export interface WorkerManagerOptions {
  queue: TaskQueue;
  registry: HandlerRegistry;
  group: string;
  concurrency?: number;
  workerIdPrefix?: string;
  shutdownGraceMs?: number;
  batchSize?: number;
  blockMs?: number;
  handlerTimeoutMs?: number;
  errorBackoffMs?: number;
  progress?: ProgressChannel;
  journal?: TaskJournal;
  logger?: Logger;
}

export interface ShutdownSummary {
  /** False when the grace period ran out and workers were abandoned. */
  graceful: boolean;
  /** Tasks left claimed but unresolved; they come back after their visibility deadline. */
  abandonedTaskIds: string[];
}

/**
 * Supervises a fixed pool of Workers bound to one consumer group.
 *
 * Usage:
 *   const manager = new WorkerManager({ queue, registry, group: "workers" });
 *   manager.start();
 *   // ... on SIGTERM
 *   await manager.stop();
 */
export class WorkerManager {
  private readonly opts: WorkerManagerOptions;
  private readonly concurrency: number;
  private readonly graceMs: number;
  private readonly logger: Logger;
  private workers: Worker[] = [];
  private stopping: Promise<ShutdownSummary> | null = null;

  constructor(opts: WorkerManagerOptions) {
    this.opts = opts;
    this.concurrency = Math.max(1, Math.floor(opts.concurrency ?? DEFAULT_WORKER_CONCURRENCY));
    this.graceMs = Math.max(0, opts.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS);
    this.logger = opts.logger ?? silentLogger;
  }

  get size(): number {
    return this.workers.length;
  }

  get workerIds(): string[] {
    return this.workers.map((w) => w.id);
  }

  isRunning(): boolean {
    return this.workers.length > 0 && this.stopping === null;
  }

  start(): void {
    if (this.workers.length > 0) throw new Error("WorkerManager already started");

    const prefix = this.opts.workerIdPrefix ?? `worker-${process.pid}`;
    for (let i = 0; i < this.concurrency; i++) {
      const worker = new Worker({
        id: `${prefix}-${i}`,
        group: this.opts.group,
        queue: this.opts.queue,
        registry: this.opts.registry,
        batchSize: this.opts.batchSize,
        blockMs: this.opts.blockMs,
        handlerTimeoutMs: this.opts.handlerTimeoutMs,
        errorBackoffMs: this.opts.errorBackoffMs,
        progress: this.opts.progress,
        journal: this.opts.journal,
        logger: this.logger,
      });
      worker.start();
      this.workers.push(worker);
    }

    this.logger.info(
      `worker manager started concurrency=${this.concurrency} group=${this.opts.group} handlers=${this.opts.registry
        .types()
        .join(",")}`
    );
  }

  /**
   * Graceful shutdown: stop claiming, wait up to the grace period for in-flight
   * tasks, then abandon whatever is left. Concurrent calls share one shutdown.
   */
  stop(): Promise<ShutdownSummary> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<ShutdownSummary> {
    const inFlight = this.workers.reduce((n, w) => n + w.inFlightTaskIds.length, 0);
    this.logger.info(`stopping worker manager workers=${this.workers.length} inFlight=${inFlight} grace=${this.graceMs}ms`);

    for (const worker of this.workers) worker.stop();

    const allDone = Promise.all(this.workers.map((w) => w.done())).then(() => true);
    const graceTimer = new AbortController();
    const graceful = await Promise.race([allDone, sleep(this.graceMs, graceTimer.signal).then(() => false)]);
    graceTimer.abort();

    if (graceful) {
      this.logger.info("worker manager stopped");
      return { graceful: true, abandonedTaskIds: [] };
    }

    const abandonedTaskIds = this.workers.flatMap((w) => w.abandon());
    this.logger.warn(
      `grace period of ${this.graceMs}ms elapsed; abandoned ${abandonedTaskIds.length} task(s): ${abandonedTaskIds.join(",")}`
    );
    return { graceful: false, abandonedTaskIds };
  }
}
