import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { FailureKind } from "./types.js";

export type TaskEvent =
  | { type: "TASK_ENQUEUED"; taskId: string; taskType: string; availableAtMs: number }
  | { type: "TASK_CLAIMED"; taskId: string; taskType: string; workerId: string; visibilityDeadlineMs: number; reclaimed: boolean }
  | { type: "TASK_SUCCEEDED"; taskId: string; taskType: string; workerId: string; attempt: number }
  | { type: "TASK_RETRY_SCHEDULED"; taskId: string; taskType: string; workerId: string; attempt: number; availableAtMs: number; error: string }
  | { type: "TASK_DEAD_LETTERED"; taskId: string; taskType: string; workerId: string; attempts: number; kind: FailureKind; error: string }
  | { type: "TASK_ABANDONED"; taskId: string; taskType: string; workerId: string };

export interface TaskJournal {
  append(event: TaskEvent): void;
}

export const noopJournal: TaskJournal = {
  append: () => {},
};

/** One JSON object per line, appended synchronously. */
export class JsonlTaskJournal implements TaskJournal {
  private readonly file: string;

  constructor(filePath: string, private readonly logger: Logger = silentLogger) {
    this.file = path.resolve(filePath);
    const dir = path.dirname(this.file);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  append(event: TaskEvent): void {
    const row = { ts: Date.now(), ...event };
    try {
      fs.appendFileSync(this.file, JSON.stringify(row) + "\n", { encoding: "utf8" });
    } catch (err) {
      // The journal is an audit trail, never a reason to fail a task
      this.logger.warn(`journal write failed for ${event.type} ${event.taskId}`, err);
    }
  }
}
