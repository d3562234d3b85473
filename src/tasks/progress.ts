import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export interface ProgressUpdate {
  taskId: string;
  stage: string;
  message?: string;
  current?: number;
  total?: number;
  /** Set on the last update a task will ever publish (completed or dead-lettered). */
  final?: boolean;
  atMs: number;
}

export type ProgressInput = Omit<ProgressUpdate, "taskId" | "atMs">;

export type ProgressListener = (update: ProgressUpdate) => void;

// ---- Limits ----
const DEFAULT_TTL_MS = 60 * 60 * 1000; // keep the last update for 1 hour
const DEFAULT_MAX_TRACKED = 10_000;

/**
 * In-process publish/subscribe keyed by task id. Owned by whoever creates it
 * (the server entry point) and handed to workers and HTTP routes by reference.
 */
export class ProgressChannel {
  private readonly listeners = new Map<string, Set<ProgressListener>>();
  private readonly latest = new Map<string, ProgressUpdate>();
  private readonly ttlMs: number;
  private readonly maxTracked: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: { ttlMs?: number; maxTracked?: number; now?: () => number; logger?: Logger } = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
    this.maxTracked = opts.maxTracked ?? DEFAULT_MAX_TRACKED;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  publish(taskId: string, input: ProgressInput): ProgressUpdate {
    const update: ProgressUpdate = { ...input, taskId, atMs: this.now() };

    this.evictExpired();
    this.latest.delete(taskId); // re-insert so Map order stays oldest-first
    this.latest.set(taskId, update);
    if (this.latest.size > this.maxTracked) {
      const oldest = this.latest.keys().next();
      if (!oldest.done) this.latest.delete(oldest.value);
    }

    const subs = this.listeners.get(taskId);
    if (subs) {
      for (const listener of [...subs]) {
        try {
          listener(update);
        } catch (err) {
          this.logger.warn(`progress listener for ${taskId} threw`, err);
        }
      }
    }
    return update;
  }

  /** Returns the unsubscribe function; calling it twice is harmless. */
  subscribe(taskId: string, listener: ProgressListener): () => void {
    let subs = this.listeners.get(taskId);
    if (!subs) {
      subs = new Set();
      this.listeners.set(taskId, subs);
    }
    subs.add(listener);

    return () => {
      const current = this.listeners.get(taskId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(taskId);
    };
  }

  latestFor(taskId: string): ProgressUpdate | null {
    const update = this.latest.get(taskId);
    if (!update) return null;
    if (this.now() - update.atMs > this.ttlMs) {
      this.latest.delete(taskId);
      return null;
    }
    return update;
  }

  subscriberCount(taskId?: string): number {
    if (taskId !== undefined) return this.listeners.get(taskId)?.size ?? 0;
    let n = 0;
    for (const subs of this.listeners.values()) n += subs.size;
    return n;
  }

  /** Drop every subscription and retained update. */
  close(): void {
    this.listeners.clear();
    this.latest.clear();
  }

  private evictExpired(): void {
    const t = this.now();
    for (const [taskId, update] of this.latest) {
      if (t - update.atMs <= this.ttlMs) break;
      this.latest.delete(taskId);
    }
  }
}
