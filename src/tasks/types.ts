export type TaskStatus = "pending" | "in-flight" | "completed" | "dead-lettered";

export interface TaskRecord {
  id: string;
  type: string;
  payload: unknown;
  group: string;
  status: TaskStatus;
  attempt: number;
  maxAttempts: number;
  enqueuedAtMs: number;
  availableAtMs: number;
  updatedAtMs: number;
  lastError: string | null;
}

export interface Claim {
  claimId: string;
  workerId: string;
  claimedAtMs: number;
  visibilityDeadlineMs: number;
}

export interface ClaimedTask {
  task: TaskRecord;
  claim: Claim;
  /** True when the task was taken over from a claim whose deadline had passed. */
  reclaimed: boolean;
}

export type FailureKind = "validation-failure" | "unknown-task-type" | "attempts-exhausted";

export interface FailureRecord {
  attempt: number;
  reason: string;
  retryable: boolean;
  failedAtMs: number;
}

export interface DeadLetterEntry {
  taskId: string;
  group: string;
  type: string;
  payload: unknown;
  attempts: number;
  failureKind: FailureKind;
  failureReason: string;
  failureHistory: FailureRecord[];
  deadLetteredAtMs: number;
}

export interface EnqueueParams {
  type: string;
  payload: unknown;
  maxAttempts?: number;
  /** Delay before the task first becomes claimable. */
  delayMs?: number;
}

export interface NackOptions {
  /** Claim the caller holds; the nack is ignored if the task was reclaimed since. */
  claimId?: string;
  /** Failure kind recorded when the nack is final. */
  kind?: Exclude<FailureKind, "attempts-exhausted">;
}

export type NackResult =
  | { status: "retrying"; attempt: number; availableAtMs: number }
  | { status: "dead-lettered"; attempts: number; kind: FailureKind }
  | { status: "ignored" };
