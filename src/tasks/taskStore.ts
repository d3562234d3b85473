import { randomUUID } from "node:crypto";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { noopJournal, type TaskJournal } from "./audit.js";
import { computeBackoffMs, DEFAULT_BACKOFF, type BackoffPolicy } from "./backoff.js";
import { DEFAULT_CLAIM_POLL_MS, DEFAULT_MAX_ATTEMPTS, DEFAULT_VISIBILITY_TIMEOUT_MS } from "./config.js";
import type { TasksDb } from "./db.js";
import { SqliteDeadLetterSink, type DeadLetterSink } from "./deadLetters.js";
import { InvalidPayloadError, isTransientStoreError, QueueUnavailableError } from "./errors.js";
import { sleep } from "./sleep.js";
import type {
  ClaimedTask,
  EnqueueParams,
  FailureKind,
  FailureRecord,
  NackOptions,
  NackResult,
  TaskRecord,
  TaskStatus,
} from "./types.js";

export interface TaskQueueOptions {
  maxAttempts?: number;
  visibilityTimeoutMs?: number;
  /** How often a blocked claim re-checks the store. */
  pollIntervalMs?: number;
  backoff?: BackoffPolicy;
  random?: () => number;
  now?: () => number;
  deadLetters?: DeadLetterSink;
  journal?: TaskJournal;
  logger?: Logger;
  /** Connection-level retry for claim/ack/nack when SQLite reports busy/locked/io errors. */
  storeRetry?: { attempts: number; baseDelayMs: number };
}

// Task row joined with the delivery state of one group. A missing delivery
// row means the group has not touched the task yet: pending, attempt 0.
interface JoinedRow {
  seq: number;
  id: string;
  type: string;
  payload_json: string;
  max_attempts: number;
  enqueued_at_ms: number;
  status: TaskStatus;
  attempt: number;
  available_at_ms: number;
  claim_id: string | null;
  claimed_by: string | null;
  visibility_deadline_ms: number | null;
  last_error: string | null;
  updated_at_ms: number;
  has_delivery: 0 | 1;
}

const JOINED_SELECT = `
  SELECT
    t.seq, t.id, t.type, t.payload_json, t.max_attempts, t.enqueued_at_ms,
    COALESCE(d.status, 'pending') AS status,
    COALESCE(d.attempt, 0) AS attempt,
    COALESCE(d.available_at_ms, t.available_at_ms) AS available_at_ms,
    d.claim_id, d.claimed_by, d.visibility_deadline_ms, d.last_error,
    COALESCE(d.updated_at_ms, t.enqueued_at_ms) AS updated_at_ms,
    CASE WHEN d.task_id IS NULL THEN 0 ELSE 1 END AS has_delivery
  FROM tasks t
  LEFT JOIN task_deliveries d ON d.task_id = t.id AND d.group_name = @group
`;

// Claimable rows the group has already touched: retries due and stale claims
const DELIVERED_CLAIMABLE = `
  SELECT
    t.seq, t.id, t.type, t.payload_json, t.max_attempts, t.enqueued_at_ms,
    d.status, d.attempt, d.available_at_ms,
    d.claim_id, d.claimed_by, d.visibility_deadline_ms, d.last_error,
    d.updated_at_ms, 1 AS has_delivery
  FROM task_deliveries d
  JOIN tasks t ON t.id = d.task_id
  WHERE d.group_name = @group
    AND ((d.status = 'pending' AND d.available_at_ms <= @now)
      OR (d.status = 'in-flight' AND d.visibility_deadline_ms <= @now))
  ORDER BY t.seq ASC
  LIMIT @limit
`;

function serializePayload(type: string, payload: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(payload ?? null);
  } catch (err) {
    throw new InvalidPayloadError(type, err);
  }
  // JSON.stringify yields undefined for functions and symbols
  if (json === undefined) throw new InvalidPayloadError(type);
  return json;
}

function toRecord(row: JoinedRow, group: string): TaskRecord {
  return {
    id: row.id,
    type: row.type,
    payload: JSON.parse(row.payload_json),
    group,
    status: row.status,
    attempt: row.attempt,
    maxAttempts: row.max_attempts,
    enqueuedAtMs: row.enqueued_at_ms,
    availableAtMs: row.available_at_ms,
    updatedAtMs: row.updated_at_ms,
    lastError: row.last_error,
  };
}

/**
 * Durable task log with consumer-group delivery state, backed by SQLite.
 *
 * Safety properties:
 * - Claims run in BEGIN IMMEDIATE transactions, so one writer claims at a time
 *   across connections and processes; a task has at most one live claim per group.
 * - Stale claims (visibility deadline passed, no ack/nack) are swept inside the
 *   same claim transaction; there is no heartbeat.
 * - Delivery is at-least-once. Handlers must be idempotent.
 */
export class TaskQueue {
  readonly deadLetters: DeadLetterSink;

  private readonly maxAttempts: number;
  readonly visibilityTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly journal: TaskJournal;
  private readonly logger: Logger;
  private readonly storeRetry: { attempts: number; baseDelayMs: number };

  constructor(private readonly db: TasksDb, opts: TaskQueueOptions = {}) {
    this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.visibilityTimeoutMs = opts.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_CLAIM_POLL_MS;
    this.backoff = opts.backoff ?? DEFAULT_BACKOFF;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;
    this.deadLetters = opts.deadLetters ?? new SqliteDeadLetterSink(db);
    this.journal = opts.journal ?? noopJournal;
    this.logger = opts.logger ?? silentLogger;
    this.storeRetry = opts.storeRetry ?? { attempts: 5, baseDelayMs: 100 };
  }

  /**
   * Append a task. A payload with no JSON form throws InvalidPayloadError; store
   * failures surface as QueueUnavailableError and are not retried here.
   */
  enqueue(type: string, payload: unknown, opts: Omit<EnqueueParams, "type" | "payload"> = {}): string {
    const payloadJson = serializePayload(type, payload);
    const id = randomUUID();
    const enqueuedAt = this.now();
    const availableAt = enqueuedAt + Math.max(0, opts.delayMs ?? 0);

    try {
      this.db
        .prepare(
          `
          INSERT INTO tasks (id, type, payload_json, max_attempts, enqueued_at_ms, available_at_ms)
          VALUES (@id, @type, @payload_json, @max_attempts, @enqueued_at_ms, @available_at_ms)
        `
        )
        .run({
          id,
          type,
          payload_json: payloadJson,
          max_attempts: opts.maxAttempts ?? this.maxAttempts,
          enqueued_at_ms: enqueuedAt,
          available_at_ms: availableAt,
        });
    } catch (err) {
      throw new QueueUnavailableError("enqueue", err);
    }

    this.journal.append({ type: "TASK_ENQUEUED", taskId: id, taskType: type, availableAtMs: availableAt });
    this.logger.debug(`enqueued ${type} id=${id}`);
    return id;
  }

  getTask(taskId: string, group: string): TaskRecord | null {
    const row = this.db.prepare(`${JOINED_SELECT} WHERE t.id = @id`).get({ group, id: taskId }) as
      | JoinedRow
      | undefined;
    return row ? toRecord(row, group) : null;
  }

  failureHistory(taskId: string, group: string): FailureRecord[] {
    const rows = this.db
      .prepare(
        `SELECT attempt, reason, retryable, failed_at_ms FROM task_failures
         WHERE group_name = ? AND task_id = ? ORDER BY id ASC`
      )
      .all(group, taskId) as Array<{ attempt: number; reason: string; retryable: number; failed_at_ms: number }>;
    return rows.map((r) => ({
      attempt: r.attempt,
      reason: r.reason,
      retryable: r.retryable === 1,
      failedAtMs: r.failed_at_ms,
    }));
  }

  /** Task counts per status for one group. */
  stats(group: string): Record<TaskStatus, number> {
    const rows = this.db
      .prepare(
        `SELECT COALESCE(d.status, 'pending') AS status, COUNT(*) AS n
         FROM tasks t LEFT JOIN task_deliveries d ON d.task_id = t.id AND d.group_name = ?
         GROUP BY 1`
      )
      .all(group) as Array<{ status: TaskStatus; n: number }>;
    const out: Record<TaskStatus, number> = { pending: 0, "in-flight": 0, completed: 0, "dead-lettered": 0 };
    for (const r of rows) out[r.status] = r.n;
    return out;
  }

  /**
   * Claim up to `maxCount` tasks for `consumerId`, waiting up to `blockTimeoutMs`
   * for one to become available. Returns [] on timeout or when `signal` aborts.
   */
  async claim(
    group: string,
    consumerId: string,
    maxCount: number,
    blockTimeoutMs: number,
    signal?: AbortSignal
  ): Promise<ClaimedTask[]> {
    const giveUpAt = Date.now() + Math.max(0, blockTimeoutMs);

    // eslint-disable-next-line no-constant-condition
    while (true) {
      if (signal?.aborted) return [];

      const batch = await this.withStoreRetry("claim", () => this.claimNow(group, consumerId, maxCount));
      if (batch.length > 0) return batch;

      const remaining = giveUpAt - Date.now();
      if (remaining <= 0) return [];
      if (!(await sleep(Math.min(this.pollIntervalMs, remaining), signal))) return [];
    }
  }

  /** Non-blocking atomic claim; the building block of `claim`. */
  claimNow(group: string, consumerId: string, maxCount: number): ClaimedTask[] {
    const limit = Math.max(0, Math.floor(maxCount));
    if (limit === 0) return [];

    const run = this.db.transaction((): ClaimedTask[] => {
      const nowMs = this.now();

      const watermark = this.advanceWatermark(group);

      const fresh = this.db
        .prepare(
          `
          ${JOINED_SELECT}
          WHERE t.seq > @watermark AND d.task_id IS NULL AND t.available_at_ms <= @now
          ORDER BY t.seq ASC
          LIMIT @limit
        `
        )
        .all({ group, watermark, now: nowMs, limit }) as JoinedRow[];
      const redelivered = this.db.prepare(DELIVERED_CLAIMABLE).all({ group, now: nowMs, limit }) as JoinedRow[];
      const picked = [...fresh, ...redelivered].sort((a, b) => a.seq - b.seq).slice(0, limit);

      const upsert = this.db.prepare(
        `
        INSERT INTO task_deliveries (
          group_name, task_id, status, attempt, available_at_ms,
          claim_id, claimed_by, claimed_at_ms, visibility_deadline_ms, last_error, updated_at_ms
        ) VALUES (
          @group, @task_id, 'in-flight', 0, @available_at_ms,
          @claim_id, @claimed_by, @now, @deadline, NULL, @now
        )
        ON CONFLICT (group_name, task_id) DO UPDATE SET
          status = 'in-flight',
          claim_id = excluded.claim_id,
          claimed_by = excluded.claimed_by,
          claimed_at_ms = excluded.claimed_at_ms,
          visibility_deadline_ms = excluded.visibility_deadline_ms,
          updated_at_ms = excluded.updated_at_ms
      `
      );

      const deadline = nowMs + this.visibilityTimeoutMs;
      return picked.map((row) => {
        const claimId = randomUUID();
        upsert.run({
          group,
          task_id: row.id,
          available_at_ms: row.available_at_ms,
          claim_id: claimId,
          claimed_by: consumerId,
          now: nowMs,
          deadline,
        });

        const reclaimed = row.status === "in-flight";
        const task = toRecord({ ...row, status: "in-flight", updated_at_ms: nowMs }, group);
        return {
          task,
          claim: { claimId, workerId: consumerId, claimedAtMs: nowMs, visibilityDeadlineMs: deadline },
          reclaimed,
        };
      });
    });

    const claimed = run.immediate();

    for (const c of claimed) {
      if (c.reclaimed) this.logger.info(`reclaimed stale task ${c.task.id} (${c.task.type}) for ${consumerId}`);
      this.journal.append({
        type: "TASK_CLAIMED",
        taskId: c.task.id,
        taskType: c.task.type,
        workerId: consumerId,
        visibilityDeadlineMs: c.claim.visibilityDeadlineMs,
        reclaimed: c.reclaimed,
      });
    }
    return claimed;
  }

  /**
   * Move the group's watermark up to just below its oldest task without a
   * delivery row, so fresh tasks are looked for past the claimed history only.
   * Runs inside the claim transaction.
   */
  private advanceWatermark(group: string): number {
    const row = this.db.prepare("SELECT seq FROM group_watermarks WHERE group_name = ?").get(group) as
      | { seq: number }
      | undefined;
    const current = row?.seq ?? 0;

    const gap = this.db
      .prepare(
        `
        SELECT t.seq FROM tasks t
        WHERE t.seq > @current
          AND NOT EXISTS (SELECT 1 FROM task_deliveries d WHERE d.group_name = @group AND d.task_id = t.id)
        ORDER BY t.seq ASC
        LIMIT 1
      `
      )
      .get({ group, current }) as { seq: number } | undefined;

    let next: number;
    if (gap) {
      next = gap.seq - 1;
    } else {
      const top = this.db.prepare("SELECT MAX(seq) AS seq FROM tasks").get() as { seq: number | null };
      next = top.seq ?? current;
    }

    if (next > current) {
      this.db
        .prepare(
          `INSERT INTO group_watermarks (group_name, seq) VALUES (?, ?)
           ON CONFLICT (group_name) DO UPDATE SET seq = excluded.seq`
        )
        .run(group, next);
    }
    return Math.max(current, next);
  }

  /**
   * Mark a task completed. Unknown, already completed or dead-lettered tasks are
   * left alone: redelivery makes duplicate acks normal. Returns whether anything changed.
   */
  async ack(taskId: string, group: string): Promise<boolean> {
    return this.withStoreRetry("ack", () => {
      const info = this.db
        .prepare(
          `
          UPDATE task_deliveries
          SET status = 'completed',
              claim_id = NULL,
              visibility_deadline_ms = NULL,
              updated_at_ms = ?
          WHERE group_name = ? AND task_id = ?
            AND status NOT IN ('completed', 'dead-lettered')
        `
        )
        .run(this.now(), group, taskId);
      return info.changes > 0;
    });
  }

  /**
   * Negative acknowledgement. Retryable failures go back to pending with a backoff
   * delay until the attempt budget is spent; everything else is dead-lettered.
   */
  async nack(
    taskId: string,
    group: string,
    reason: string,
    retryable: boolean,
    opts: NackOptions = {}
  ): Promise<NackResult> {
    return this.withStoreRetry("nack", () => this.nackNow(taskId, group, reason, retryable, opts));
  }

  private nackNow(taskId: string, group: string, reason: string, retryable: boolean, opts: NackOptions): NackResult {
    const run = this.db.transaction((): NackResult => {
      const nowMs = this.now();
      const row = this.db.prepare(`${JOINED_SELECT} WHERE t.id = @id`).get({ group, id: taskId }) as
        | JoinedRow
        | undefined;

      if (!row || row.has_delivery === 0 || row.status !== "in-flight") return { status: "ignored" };
      // Our claim expired and someone else holds the task now
      if (opts.claimId !== undefined && row.claim_id !== opts.claimId) return { status: "ignored" };

      this.db
        .prepare(
          `INSERT INTO task_failures (group_name, task_id, attempt, reason, retryable, failed_at_ms)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(group, taskId, row.attempt, reason, retryable ? 1 : 0, nowMs);

      const nextAttempt = retryable ? row.attempt + 1 : row.attempt;

      if (retryable && nextAttempt < row.max_attempts) {
        const availableAt = nowMs + computeBackoffMs(row.attempt, this.backoff, this.random);
        this.db
          .prepare(
            `
            UPDATE task_deliveries
            SET status = 'pending',
                attempt = ?,
                available_at_ms = ?,
                claim_id = NULL,
                claimed_by = NULL,
                claimed_at_ms = NULL,
                visibility_deadline_ms = NULL,
                last_error = ?,
                updated_at_ms = ?
            WHERE group_name = ? AND task_id = ?
          `
          )
          .run(nextAttempt, availableAt, reason, nowMs, group, taskId);
        return { status: "retrying", attempt: nextAttempt, availableAtMs: availableAt };
      }

      const kind: FailureKind = retryable ? "attempts-exhausted" : opts.kind ?? "validation-failure";
      this.db
        .prepare(
          `
          UPDATE task_deliveries
          SET status = 'dead-lettered',
              attempt = ?,
              claim_id = NULL,
              visibility_deadline_ms = NULL,
              last_error = ?,
              updated_at_ms = ?
          WHERE group_name = ? AND task_id = ?
        `
        )
        .run(nextAttempt, reason, nowMs, group, taskId);

      this.deadLetters.record({
        taskId,
        group,
        type: row.type,
        payload: JSON.parse(row.payload_json),
        attempts: nextAttempt,
        failureKind: kind,
        failureReason: kind === "attempts-exhausted" ? `Max attempts (${row.max_attempts}) exceeded: ${reason}` : reason,
        failureHistory: this.failureHistory(taskId, group),
        deadLetteredAtMs: nowMs,
      });
      return { status: "dead-lettered", attempts: nextAttempt, kind };
    });

    return run.immediate();
  }

  private async withStoreRetry<T>(operation: string, fn: () => T): Promise<T> {
    for (let i = 0; ; i++) {
      try {
        return fn();
      } catch (err) {
        if (!isTransientStoreError(err)) throw err;
        if (i + 1 >= this.storeRetry.attempts) {
          this.logger.error(`${operation} failed after ${i + 1} attempts`, err);
          throw new QueueUnavailableError(operation, err);
        }
        const waitMs = this.storeRetry.baseDelayMs * Math.pow(2, i);
        this.logger.warn(`${operation} hit a store error, retrying in ${waitMs}ms`, err);
        await sleep(waitMs);
      }
    }
  }
}
