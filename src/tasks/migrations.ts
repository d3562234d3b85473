import type { TasksDb } from "./db.js";

export function migrateTasksDb(db: TasksDb): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      type TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      max_attempts INTEGER NOT NULL,
      enqueued_at_ms INTEGER NOT NULL,
      available_at_ms INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS task_deliveries (
      group_name TEXT NOT NULL,
      task_id TEXT NOT NULL,
      status TEXT NOT NULL,
      attempt INTEGER NOT NULL DEFAULT 0,
      available_at_ms INTEGER NOT NULL,
      claim_id TEXT,
      claimed_by TEXT,
      claimed_at_ms INTEGER,
      visibility_deadline_ms INTEGER,
      last_error TEXT,
      updated_at_ms INTEGER NOT NULL,
      PRIMARY KEY (group_name, task_id),
      FOREIGN KEY (task_id) REFERENCES tasks(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS task_failures (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      group_name TEXT NOT NULL,
      task_id TEXT NOT NULL,
      attempt INTEGER NOT NULL,
      reason TEXT NOT NULL,
      retryable INTEGER NOT NULL,
      failed_at_ms INTEGER NOT NULL,
      FOREIGN KEY (task_id) REFERENCES tasks(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS dead_letters (
      group_name TEXT NOT NULL,
      task_id TEXT NOT NULL,
      type TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      attempts INTEGER NOT NULL,
      failure_kind TEXT NOT NULL,
      failure_reason TEXT NOT NULL,
      failure_history_json TEXT NOT NULL,
      dead_lettered_at_ms INTEGER NOT NULL,
      PRIMARY KEY (group_name, task_id)
    );

    -- Highest seq below which every task has a delivery row for the group
    CREATE TABLE IF NOT EXISTS group_watermarks (
      group_name TEXT PRIMARY KEY,
      seq INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_deliveries_claimable
      ON task_deliveries(group_name, status, available_at_ms);

    CREATE INDEX IF NOT EXISTS idx_deliveries_deadline
      ON task_deliveries(group_name, status, visibility_deadline_ms);

    CREATE INDEX IF NOT EXISTS idx_failures_task
      ON task_failures(group_name, task_id);

    CREATE INDEX IF NOT EXISTS idx_dead_letters_time
      ON dead_letters(dead_lettered_at_ms);
  `);

  // Answers written by the question:solve handler
  db.exec(`
    CREATE TABLE IF NOT EXISTS answers (
      task_id TEXT PRIMARY KEY,
      question TEXT NOT NULL,
      subject TEXT,
      answer TEXT NOT NULL,
      model TEXT NOT NULL,
      created_at_ms INTEGER NOT NULL
    );
  `);
}
