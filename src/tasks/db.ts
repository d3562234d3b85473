import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export type TasksDb = Database.Database;

/** Open (or create) the task store. Each caller owns the handle it gets. */
export function openTasksDb(dbPath: string, opts: { busyTimeoutMs?: number } = {}): TasksDb {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL: readers keep going while one connection claims
  db.pragma("journal_mode = WAL");

  // FULL = an ack is on disk before we move on
  db.pragma("synchronous = FULL");

  db.pragma("foreign_keys = ON");

  db.pragma(`busy_timeout = ${Math.max(0, Math.floor(opts.busyTimeoutMs ?? 5_000))}`);

  return db;
}
