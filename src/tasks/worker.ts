import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { noopJournal, type TaskJournal } from "./audit.js";
import { DEFAULT_CLAIM_BLOCK_MS, DEFAULT_HANDLER_TIMEOUT_MS } from "./config.js";
import { errorMessage } from "./errors.js";
import type { HandlerRegistry, Outcome, TaskHandler } from "./handlerRegistry.js";
import type { ProgressChannel } from "./progress.js";
import { sleep } from "./sleep.js";
import type { TaskQueue } from "./taskStore.js";
import type { ClaimedTask, FailureKind } from "./types.js";

export interface WorkerOptions {
  id: string;
  group: string;
  queue: TaskQueue;
  registry: HandlerRegistry;
  batchSize?: number;
  blockMs?: number;
  handlerTimeoutMs?: number;
  /** Pause after the store refused a claim, before trying again. */
  errorBackoffMs?: number;
  progress?: ProgressChannel;
  journal?: TaskJournal;
  logger?: Logger;
}

export type WorkerState = "idle" | "running" | "stopping" | "stopped";

/**
 * A handler must settle before its claim can be reclaimed. Budgets are kept
 * below the visibility timeout by a margin of 10% of it, at most 1s, left for
 * the ack or nack.
 */
export function capBudgetMs(requestedMs: number, visibilityTimeoutMs: number): number {
  const ceiling = visibilityTimeoutMs - Math.min(1_000, Math.floor(visibilityTimeoutMs / 10));
  return Math.max(1, Math.min(requestedMs, ceiling));
}

/**
 * One claim → dispatch → ack/nack loop. Workers share nothing with each other;
 * every decision that matters goes through the queue.
 */
export class Worker {
  readonly id: string;

  private readonly group: string;
  private readonly queue: TaskQueue;
  private readonly registry: HandlerRegistry;
  private readonly batchSize: number;
  private readonly blockMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly errorBackoffMs: number;
  private readonly progress: ProgressChannel | undefined;
  private readonly journal: TaskJournal;
  private readonly logger: Logger;

  // stop: no new claims (interrupts a blocked claim). abandon: give up on handlers too.
  private readonly stopController = new AbortController();
  private readonly abandonController = new AbortController();
  private readonly inFlight = new Set<string>();
  private loop: Promise<void> | null = null;
  private state: WorkerState = "idle";

  constructor(opts: WorkerOptions) {
    this.id = opts.id;
    this.group = opts.group;
    this.queue = opts.queue;
    this.registry = opts.registry;
    this.batchSize = opts.batchSize ?? 1;
    this.blockMs = opts.blockMs ?? DEFAULT_CLAIM_BLOCK_MS;
    this.handlerTimeoutMs = opts.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
    this.errorBackoffMs = opts.errorBackoffMs ?? 1_000;
    this.progress = opts.progress;
    this.journal = opts.journal ?? noopJournal;
    this.logger = (opts.logger ?? silentLogger).child(`[${opts.id}]`);
  }

  get status(): WorkerState {
    return this.state;
  }

  get inFlightTaskIds(): string[] {
    return [...this.inFlight];
  }

  start(): void {
    if (this.loop) throw new Error(`Worker ${this.id} already started`);
    this.state = "running";
    this.loop = this.run().finally(() => {
      this.state = "stopped";
    });
  }

  /** Stop claiming; tasks already claimed run to ack/nack. */
  stop(): void {
    if (this.state === "running") this.state = "stopping";
    this.stopController.abort();
  }

  /**
   * Give up on in-flight tasks without resolving them. Their claims stay live
   * until the visibility deadline, after which any consumer may reclaim them.
   */
  abandon(): string[] {
    this.stop();
    this.abandonController.abort();
    return this.inFlightTaskIds;
  }

  /** Resolves once the loop has exited. Never rejects. */
  done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    const stopSignal = this.stopController.signal;
    this.logger.info(`starting group=${this.group} batch=${this.batchSize} block=${this.blockMs}ms`);

    while (!stopSignal.aborted) {
      let batch: ClaimedTask[];
      try {
        batch = await this.queue.claim(this.group, this.id, this.batchSize, this.blockMs, stopSignal);
      } catch (err) {
        this.logger.error("claim failed", err);
        await sleep(this.errorBackoffMs, stopSignal);
        continue;
      }

      // Every task in the batch shares one visibility deadline, so all of them start now
      await Promise.all(batch.map((claimed) => this.handle(claimed)));
    }

    this.logger.info("stopped");
  }

  private async handle(claimed: ClaimedTask): Promise<void> {
    const { task } = claimed;
    this.inFlight.add(task.id);
    try {
      const handler = this.registry.resolve(task.type);
      if (!handler) {
        this.logger.error(`no handler registered for type=${task.type} task=${task.id}`);
        await this.resolve(claimed, { kind: "fatal-failure", reason: `Unknown task type: ${task.type}` }, "unknown-task-type");
        return;
      }

      const outcome = await this.invoke(handler, claimed);

      if (this.abandonController.signal.aborted) {
        this.logger.warn(`abandoned task ${task.id} (${task.type}); claim left to expire`);
        this.journal.append({ type: "TASK_ABANDONED", taskId: task.id, taskType: task.type, workerId: this.id });
        return;
      }

      await this.resolve(claimed, outcome);
    } catch (err) {
      // ack/nack could not reach the store; the claim expires and the task is redelivered
      this.logger.error(`could not resolve task ${task.id}`, err);
    } finally {
      this.inFlight.delete(task.id);
    }
  }

  /** Run the handler within its budget. Faults and timeouts become retryable failures. */
  private async invoke(handler: TaskHandler, claimed: ClaimedTask): Promise<Outcome> {
    const { task } = claimed;
    const budgetMs = capBudgetMs(handler.timeoutMs ?? this.handlerTimeoutMs, this.queue.visibilityTimeoutMs);
    const controller = new AbortController();
    const abandonSignal = this.abandonController.signal;

    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<Outcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new Error(`timed out after ${budgetMs}ms`));
        resolve({ kind: "retryable-failure", reason: `timed out after ${budgetMs}ms` });
      }, budgetMs);
    });

    let resolveAbandoned: (outcome: Outcome) => void = () => {};
    const abandoned = new Promise<Outcome>((resolve) => {
      resolveAbandoned = resolve;
    });
    const onAbandon = () => {
      controller.abort(new Error("worker abandoned"));
      resolveAbandoned({ kind: "retryable-failure", reason: "worker abandoned" });
    };
    if (abandonSignal.aborted) onAbandon();
    else abandonSignal.addEventListener("abort", onAbandon, { once: true });

    const processed = Promise.resolve()
      .then(() =>
        handler.process(task.payload, {
          taskId: task.id,
          taskType: task.type,
          attempt: task.attempt,
          workerId: this.id,
          signal: controller.signal,
          reportProgress: (update) => this.progress?.publish(task.id, update),
          logger: this.logger,
        })
      )
      .catch((err: unknown): Outcome => {
        this.logger.error(`handler fault in ${task.type} task=${task.id}`, err);
        return { kind: "retryable-failure", reason: `handler fault: ${errorMessage(err)}` };
      });

    try {
      return await Promise.race([processed, timedOut, abandoned]);
    } finally {
      clearTimeout(timer);
      abandonSignal.removeEventListener("abort", onAbandon);
    }
  }

  private async resolve(claimed: ClaimedTask, outcome: Outcome, fatalKind?: Exclude<FailureKind, "attempts-exhausted">) {
    const { task, claim } = claimed;

    if (outcome.kind === "success") {
      await this.queue.ack(task.id, this.group);
      this.journal.append({ type: "TASK_SUCCEEDED", taskId: task.id, taskType: task.type, workerId: this.id, attempt: task.attempt });
      this.progress?.publish(task.id, { stage: "completed", final: true });
      this.logger.info(`completed ${task.type} task=${task.id} attempt=${task.attempt}`);
      return;
    }

    const retryable = outcome.kind === "retryable-failure";
    const res = await this.queue.nack(task.id, this.group, outcome.reason, retryable, {
      claimId: claim.claimId,
      kind: fatalKind,
    });

    switch (res.status) {
      case "retrying":
        this.journal.append({
          type: "TASK_RETRY_SCHEDULED",
          taskId: task.id,
          taskType: task.type,
          workerId: this.id,
          attempt: res.attempt,
          availableAtMs: res.availableAtMs,
          error: outcome.reason,
        });
        this.progress?.publish(task.id, { stage: "retrying", message: outcome.reason });
        this.logger.warn(`retry scheduled for ${task.type} task=${task.id} attempt=${res.attempt}: ${outcome.reason}`);
        break;
      case "dead-lettered":
        this.journal.append({
          type: "TASK_DEAD_LETTERED",
          taskId: task.id,
          taskType: task.type,
          workerId: this.id,
          attempts: res.attempts,
          kind: res.kind,
          error: outcome.reason,
        });
        this.progress?.publish(task.id, { stage: "dead-lettered", message: outcome.reason, final: true });
        this.logger.warn(`dead-lettered ${task.type} task=${task.id} kind=${res.kind}: ${outcome.reason}`);
        break;
      case "ignored":
        this.logger.debug(`nack for task ${task.id} ignored; claim no longer held`);
        break;
    }
  }
}
