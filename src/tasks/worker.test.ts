import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import type { TaskEvent, TaskJournal } from "./audit.js";
import { SqliteDeadLetterSink } from "./deadLetters.js";
import {
  createHandlerRegistry,
  defineHandler,
  failFatally,
  retryLater,
  succeed,
  type HandlerRegistry,
  type TaskHandler,
} from "./handlerRegistry.js";
import { ProgressChannel } from "./progress.js";
import { TaskQueue } from "./taskStore.js";
import { createTempStore, waitFor, type TempStore } from "./test-utils.js";
import { capBudgetMs, Worker } from "./worker.js";

const GROUP = "workers";

class RecordingJournal implements TaskJournal {
  readonly events: TaskEvent[] = [];
  append(event: TaskEvent): void {
    this.events.push(event);
  }
}

const handler = (process: TaskHandler["process"], timeoutMs?: number): TaskHandler => ({ process, timeoutMs });

describe("capBudgetMs", () => {
  it("keeps budgets that already fit", () => {
    expect(capBudgetMs(240_000, 300_000)).toBe(240_000);
  });

  it("leaves a margin below the visibility timeout", () => {
    expect(capBudgetMs(180_000, 120_000)).toBe(119_000);
    expect(capBudgetMs(10_000, 300)).toBe(270);
  });
});

describe("Worker", () => {
  let store: TempStore;
  let queue: TaskQueue;
  let deadLetters: SqliteDeadLetterSink;
  let progress: ProgressChannel;
  let journal: RecordingJournal;
  let workers: Worker[];

  const startWorker = (registry: HandlerRegistry, id = "w-test", opts: { batchSize?: number; on?: TaskQueue } = {}) => {
    const worker = new Worker({
      id,
      group: GROUP,
      queue: opts.on ?? queue,
      registry,
      batchSize: opts.batchSize,
      blockMs: 20,
      progress,
      journal,
    });
    worker.start();
    workers.push(worker);
    return worker;
  };

  const statusOf = (id: string) => queue.getTask(id, GROUP)?.status;

  beforeEach(() => {
    store = createTempStore();
    deadLetters = new SqliteDeadLetterSink(store.db);
    queue = new TaskQueue(store.db, {
      backoff: { baseMs: 1, capMs: 5, jitterMs: 0 },
      visibilityTimeoutMs: 30_000,
      pollIntervalMs: 5,
      deadLetters,
    });
    progress = new ProgressChannel();
    journal = new RecordingJournal();
    workers = [];
  });

  afterEach(async () => {
    for (const w of workers) w.abandon();
    await Promise.all(workers.map((w) => w.done()));
    store.cleanup();
  });

  it("completes a task whose handler succeeds on the first claim", async () => {
    let calls = 0;
    startWorker(
      createHandlerRegistry([
        [
          "echo",
          handler(async () => {
            calls++;
            return succeed();
          }),
        ],
      ])
    );

    const id = queue.enqueue("echo", { msg: "hi" });
    await waitFor(() => statusOf(id) === "completed");

    expect(calls).toBe(1);
    expect(queue.getTask(id, GROUP)?.attempt).toBe(0);
    expect(journal.events).toContainEqual({
      type: "TASK_SUCCEEDED",
      taskId: id,
      taskType: "echo",
      workerId: "w-test",
      attempt: 0,
    });
  });

  it("retries retryable failures and completes on the third delivery", async () => {
    const attemptsSeen: number[] = [];
    startWorker(
      createHandlerRegistry([
        [
          "flaky",
          handler(async (_payload, ctx) => {
            attemptsSeen.push(ctx.attempt);
            return ctx.attempt < 2 ? retryLater("not yet") : succeed();
          }),
        ],
      ])
    );

    const id = queue.enqueue("flaky", null, { maxAttempts: 3 });
    await waitFor(() => statusOf(id) === "completed");

    expect(attemptsSeen).toEqual([0, 1, 2]);
    expect(queue.getTask(id, GROUP)?.attempt).toBe(2);
    const retries = journal.events.flatMap((e) => (e.type === "TASK_RETRY_SCHEDULED" ? [e.attempt] : []));
    expect(retries).toEqual([1, 2]);
  });

  it("dead-letters a task that keeps failing once max attempts is reached", async () => {
    startWorker(createHandlerRegistry([["broken", handler(async () => retryLater("still failing"))]]));

    const id = queue.enqueue("broken", { n: 3 }, { maxAttempts: 3 });
    await waitFor(() => statusOf(id) === "dead-lettered");

    const entry = deadLetters.get(id, GROUP);
    expect(entry?.attempts).toBe(3);
    expect(entry?.failureKind).toBe("attempts-exhausted");
    expect(entry?.failureReason).toBe("Max attempts (3) exceeded: still failing");
    expect(entry?.payload).toEqual({ n: 3 });
  });

  it("dead-letters an unregistered type immediately with zero attempts", async () => {
    startWorker(createHandlerRegistry([["echo", handler(async () => succeed())]]));

    const id = queue.enqueue("unregistered", null);
    await waitFor(() => statusOf(id) === "dead-lettered");

    const entry = deadLetters.get(id, GROUP);
    expect(entry?.attempts).toBe(0);
    expect(entry?.failureKind).toBe("unknown-task-type");
    expect(entry?.failureReason).toBe("Unknown task type: unregistered");
  });

  it("dead-letters a fatal outcome without retrying", async () => {
    let calls = 0;
    startWorker(
      createHandlerRegistry([
        [
          "strict",
          handler(async () => {
            calls++;
            return failFatally("bad input");
          }),
        ],
      ])
    );

    const id = queue.enqueue("strict", null);
    await waitFor(() => statusOf(id) === "dead-lettered");

    expect(calls).toBe(1);
    expect(deadLetters.get(id, GROUP)?.failureKind).toBe("validation-failure");
  });

  it("dead-letters an invalid payload through a schema-checked handler", async () => {
    const Payload = z.object({ n: z.number() });
    startWorker(createHandlerRegistry([["typed", defineHandler(Payload, async () => succeed())]]));

    const id = queue.enqueue("typed", { n: "three" });
    await waitFor(() => statusOf(id) === "dead-lettered");

    expect(deadLetters.get(id, GROUP)?.failureReason).toBe("invalid payload: n: Expected number, received string");
  });

  it("turns a thrown error into a retryable handler fault", async () => {
    startWorker(
      createHandlerRegistry([
        [
          "throws",
          handler(async () => {
            throw new Error("kaboom");
          }),
        ],
      ])
    );

    const id = queue.enqueue("throws", null, { maxAttempts: 1 });
    await waitFor(() => statusOf(id) === "dead-lettered");

    const entry = deadLetters.get(id, GROUP);
    expect(entry?.failureHistory.map((f) => [f.reason, f.retryable])).toEqual([["handler fault: kaboom", true]]);
    expect(entry?.failureReason).toBe("Max attempts (1) exceeded: handler fault: kaboom");
  });

  it("times out a handler that overruns its budget and aborts its signal", async () => {
    let sawAbort = false;
    startWorker(
      createHandlerRegistry([
        [
          "slow",
          handler(
            (_payload, ctx) =>
              new Promise((resolve) => {
                ctx.signal.addEventListener("abort", () => {
                  sawAbort = true;
                  resolve(succeed());
                });
              }),
            20
          ),
        ],
      ])
    );

    const id = queue.enqueue("slow", null, { maxAttempts: 1 });
    await waitFor(() => statusOf(id) === "dead-lettered");

    expect(sawAbort).toBe(true);
    expect(deadLetters.get(id, GROUP)?.failureHistory[0]?.reason).toBe("timed out after 20ms");
  });

  it("publishes handler progress and a final completed update", async () => {
    startWorker(
      createHandlerRegistry([
        [
          "report",
          handler(async (_payload, ctx) => {
            ctx.reportProgress({ stage: "working", current: 1, total: 2 });
            return succeed();
          }),
        ],
      ])
    );

    const id = queue.enqueue("report", null);
    const stages: string[] = [];
    progress.subscribe(id, (u) => stages.push(u.stage));
    await waitFor(() => statusOf(id) === "completed" && stages.length === 2);

    expect(stages).toEqual(["working", "completed"]);
    expect(progress.latestFor(id)?.final).toBe(true);
  });

  it("stops promptly while blocked on an empty queue", async () => {
    const worker = startWorker(createHandlerRegistry([]));
    worker.stop();
    await worker.done();

    expect(worker.status).toBe("stopped");
  });

  it("refuses to start twice", () => {
    const worker = startWorker(createHandlerRegistry([]));
    expect(() => worker.start()).toThrow("Worker w-test already started");
  });

  it("starts every task of a claimed batch before any of them can be reclaimed", async () => {
    const shortClaims = new TaskQueue(store.db, { visibilityTimeoutMs: 300, pollIntervalMs: 5, deadLetters });
    const runs = new Map<string, string[]>();
    const registry = createHandlerRegistry([
      [
        "slow",
        handler(async (_payload, ctx) => {
          runs.set(ctx.taskId, [...(runs.get(ctx.taskId) ?? []), ctx.workerId]);
          await new Promise((r) => setTimeout(r, 180));
          return succeed();
        }, 270),
      ],
    ]);

    const ids = [shortClaims.enqueue("slow", 1), shortClaims.enqueue("slow", 2)];
    startWorker(registry, "batcher", { batchSize: 2, on: shortClaims });
    await waitFor(() => runs.size === 2);
    startWorker(registry, "single", { on: shortClaims });

    await waitFor(() => ids.every((id) => statusOf(id) === "completed"));
    expect(ids.map((id) => runs.get(id))).toEqual([["batcher"], ["batcher"]]);
  });

  it("caps a handler budget below the visibility timeout", async () => {
    const shortClaims = new TaskQueue(store.db, { visibilityTimeoutMs: 300, pollIntervalMs: 5, deadLetters });
    const registry = createHandlerRegistry([
      [
        "stalls",
        handler(
          (_payload, ctx) => new Promise((resolve) => ctx.signal.addEventListener("abort", () => resolve(succeed()))),
          10_000
        ),
      ],
    ]);

    const id = shortClaims.enqueue("stalls", null, { maxAttempts: 1 });
    startWorker(registry, "w-test", { on: shortClaims });
    await waitFor(() => statusOf(id) === "dead-lettered");

    expect(deadLetters.get(id, GROUP)?.failureHistory.map((f) => f.reason)).toEqual(["timed out after 270ms"]);
  });

  it("reports every claimed task of a batch when abandoned", async () => {
    let started = 0;
    const worker = startWorker(
      createHandlerRegistry([
        [
          "hang",
          handler(() => {
            started++;
            return new Promise(() => {});
          }),
        ],
      ]),
      "w-test",
      { batchSize: 3 }
    );

    const ids = [queue.enqueue("hang", 1), queue.enqueue("hang", 2)];
    await waitFor(() => started === 2);

    expect(worker.abandon().sort()).toEqual([...ids].sort());
    await worker.done();
    expect(ids.map(statusOf)).toEqual(["in-flight", "in-flight"]);
  });

  it("leaves an abandoned task claimed and unresolved", async () => {
    let started = false;
    const worker = startWorker(
      createHandlerRegistry([
        [
          "hang",
          handler(() => {
            started = true;
            return new Promise(() => {});
          }),
        ],
      ])
    );

    const id = queue.enqueue("hang", null);
    await waitFor(() => started);

    expect(worker.abandon()).toEqual([id]);
    await worker.done();

    expect(statusOf(id)).toBe("in-flight");
    expect(journal.events).toContainEqual({ type: "TASK_ABANDONED", taskId: id, taskType: "hang", workerId: "w-test" });
  });
});
