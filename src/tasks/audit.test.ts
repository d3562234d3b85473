import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { JsonlTaskJournal } from "./audit.js";

describe("JsonlTaskJournal", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskwell-journal-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON object per event, creating the directory", () => {
    const file = path.join(dir, "nested", "events.jsonl");
    const journal = new JsonlTaskJournal(file);

    journal.append({ type: "TASK_ENQUEUED", taskId: "t1", taskType: "echo", availableAtMs: 5 });
    journal.append({ type: "TASK_ABANDONED", taskId: "t1", taskType: "echo", workerId: "w-0" });

    const lines = fs.readFileSync(file, "utf8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({ type: "TASK_ENQUEUED", taskId: "t1", availableAtMs: 5 });
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({ type: "TASK_ABANDONED", workerId: "w-0" });
    expect(typeof JSON.parse(lines[1] ?? "").ts).toBe("number");
  });

  it("logs instead of throwing when the write fails", () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    // A directory where the file should be
    const journal = new JsonlTaskJournal(dir, logger);

    expect(() => journal.append({ type: "TASK_ABANDONED", taskId: "t1", taskType: "echo", workerId: "w-0" })).not.toThrow();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe("journal write failed for TASK_ABANDONED t1");
  });
});
