export type TaskQueueErrorCode = "QUEUE_UNAVAILABLE" | "CONFIG_INVALID" | "HANDLER_DUPLICATE" | "PAYLOAD_INVALID";

export class TaskQueueError extends Error {
  readonly code: TaskQueueErrorCode;

  constructor(code: TaskQueueErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TaskQueueError";
    this.code = code;
  }
}

/** The backing store could not be reached or kept refusing the operation. */
export class QueueUnavailableError extends TaskQueueError {
  constructor(operation: string, cause: unknown) {
    super("QUEUE_UNAVAILABLE", `Task store unavailable during ${operation}: ${errorMessage(cause)}`, { cause });
    this.name = "QueueUnavailableError";
  }
}

/** The payload has no JSON form (a BigInt, a cycle, a bare function). Nothing was written. */
export class InvalidPayloadError extends TaskQueueError {
  constructor(taskType: string, cause?: unknown) {
    const detail = cause === undefined ? "not JSON-serializable" : errorMessage(cause);
    super("PAYLOAD_INVALID", `Payload for ${taskType} cannot be stored: ${detail}`, { cause });
    this.name = "InvalidPayloadError";
  }
}

export class ConfigError extends TaskQueueError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class HandlerRegistrationError extends TaskQueueError {
  constructor(taskType: string) {
    super("HANDLER_DUPLICATE", `Handler already registered for type: ${taskType}`);
    this.name = "HandlerRegistrationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// better-sqlite3 surfaces SQLite result codes on SqliteError.code
const TRANSIENT_SQLITE_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_IOERR", "SQLITE_CANTOPEN"]);

export function isTransientStoreError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  const code = err.code;
  if (typeof code !== "string") return false;
  for (const prefix of TRANSIENT_SQLITE_CODES) {
    if (code === prefix || code.startsWith(`${prefix}_`)) return true;
  }
  return false;
}
