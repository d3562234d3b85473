import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { openTasksDb, type TasksDb } from "./db.js";
import { migrateTasksDb } from "./migrations.js";

export interface TempStore {
  db: TasksDb;
  dbPath: string;
  /** A second connection to the same file, standing in for another process. */
  connect(): TasksDb;
  cleanup(): void;
}

export function createTempStore(): TempStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskwell-"));
  const dbPath = path.join(dir, "tasks.db");
  const db = openTasksDb(dbPath);
  migrateTasksDb(db);
  const extra: TasksDb[] = [];

  return {
    db,
    dbPath,
    connect() {
      const conn = openTasksDb(dbPath);
      extra.push(conn);
      return conn;
    },
    cleanup() {
      for (const conn of extra) if (conn.open) conn.close();
      if (db.open) db.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Manually advanced clock for visibility deadlines and backoff delays. */
export function createClock(startMs = 1_700_000_000_000) {
  let t = startMs;
  return {
    now: () => t,
    advance(ms: number) {
      t += ms;
    },
  };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 3_000, intervalMs = 5): Promise<void> {
  const start = Date.now();
  while (!predicate()) {
    if (Date.now() - start > timeoutMs) throw new Error(`waitFor timed out after ${timeoutMs}ms`);
    await new Promise((r) => setTimeout(r, intervalMs));
  }
}
