#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { openTasksDb } from "./db.js";
import { migrateTasksDb } from "./migrations.js";
import { JsonlTaskJournal, noopJournal } from "./audit.js";
import { TaskQueue } from "./taskStore.js";

// Usage: taskwell-enqueue <type> [payload-json]
const [type, rawPayload] = process.argv.slice(2);

if (!type) {
  console.error("usage: taskwell-enqueue <type> [payload-json]");
  process.exit(2);
}

let payload: unknown = null;
if (rawPayload !== undefined) {
  try {
    payload = JSON.parse(rawPayload);
  } catch {
    console.error(`[enqueue] payload is not valid JSON: ${rawPayload}`);
    process.exit(2);
  }
}

const config = loadConfig();
const db = openTasksDb(config.dbPath);
migrateTasksDb(db);

const queue = new TaskQueue(db, {
  maxAttempts: config.maxAttempts,
  journal: config.eventsPath ? new JsonlTaskJournal(config.eventsPath) : noopJournal,
});

const id = queue.enqueue(type, payload);
db.close();

console.log(`[enqueue] ${type} ${id}`);
