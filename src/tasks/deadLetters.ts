import type { TasksDb } from "./db.js";
import type { DeadLetterEntry, FailureKind, FailureRecord } from "./types.js";

/**
 * Terminal quarantine for tasks that will not be retried. The queue core only
 * ever calls `record`; reading is for operators.
 */
export interface DeadLetterSink {
  record(entry: DeadLetterEntry): void;
}

interface DeadLetterRow {
  group_name: string;
  task_id: string;
  type: string;
  payload_json: string;
  attempts: number;
  failure_kind: FailureKind;
  failure_reason: string;
  failure_history_json: string;
  dead_lettered_at_ms: number;
}

function fromRow(row: DeadLetterRow): DeadLetterEntry {
  return {
    taskId: row.task_id,
    group: row.group_name,
    type: row.type,
    payload: JSON.parse(row.payload_json),
    attempts: row.attempts,
    failureKind: row.failure_kind,
    failureReason: row.failure_reason,
    failureHistory: JSON.parse(row.failure_history_json) as FailureRecord[],
    deadLetteredAtMs: row.dead_lettered_at_ms,
  };
}

export class SqliteDeadLetterSink implements DeadLetterSink {
  constructor(private readonly db: TasksDb) {}

  /** Append-only: a second record for the same (group, task) is dropped. */
  record(entry: DeadLetterEntry): void {
    this.db
      .prepare(
        `
        INSERT OR IGNORE INTO dead_letters (
          group_name, task_id, type, payload_json, attempts,
          failure_kind, failure_reason, failure_history_json, dead_lettered_at_ms
        ) VALUES (
          @group_name, @task_id, @type, @payload_json, @attempts,
          @failure_kind, @failure_reason, @failure_history_json, @dead_lettered_at_ms
        )
      `
      )
      .run({
        group_name: entry.group,
        task_id: entry.taskId,
        type: entry.type,
        payload_json: JSON.stringify(entry.payload ?? null),
        attempts: entry.attempts,
        failure_kind: entry.failureKind,
        failure_reason: entry.failureReason,
        failure_history_json: JSON.stringify(entry.failureHistory),
        dead_lettered_at_ms: entry.deadLetteredAtMs,
      });
  }

  get(taskId: string, group: string): DeadLetterEntry | null {
    const row = this.db
      .prepare(`SELECT * FROM dead_letters WHERE task_id = ? AND group_name = ?`)
      .get(taskId, group) as DeadLetterRow | undefined;
    return row ? fromRow(row) : null;
  }

  /** Newest first. */
  list(opts: { group?: string; limit?: number } = {}): DeadLetterEntry[] {
    const limit = Math.min(Math.max(1, opts.limit ?? 50), 500);
    const rows = (
      opts.group === undefined
        ? this.db.prepare(`SELECT * FROM dead_letters ORDER BY dead_lettered_at_ms DESC LIMIT ?`).all(limit)
        : this.db
            .prepare(`SELECT * FROM dead_letters WHERE group_name = ? ORDER BY dead_lettered_at_ms DESC LIMIT ?`)
            .all(opts.group, limit)
    ) as DeadLetterRow[];
    return rows.map(fromRow);
  }

  count(group?: string): number {
    const row = (
      group === undefined
        ? this.db.prepare(`SELECT COUNT(*) AS n FROM dead_letters`).get()
        : this.db.prepare(`SELECT COUNT(*) AS n FROM dead_letters WHERE group_name = ?`).get(group)
    ) as { n: number };
    return row.n;
  }
}
