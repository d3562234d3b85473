export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(prefix: string): Logger;
}

/**
 * Console logger with a minimum level and a bracketed prefix.
 *
 * ```ts
 * const log = createLogger("debug", "[task-runner]");
 * log.info("started"); // 2026-01-21T12:00:00.000Z INFO  [task-runner] started
 * ```
 */
export function createLogger(minLevel: LogLevel = "info", prefix = "[taskwell]"): Logger {
  const threshold = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < threshold) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

    switch (level) {
      case "debug":
        console.debug(line, ...args);
        break;
      case "info":
        console.info(line, ...args);
        break;
      case "warn":
        console.warn(line, ...args);
        break;
      case "error":
        console.error(line, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log("debug", message, ...args),
    info: (message, ...args) => log("info", message, ...args),
    warn: (message, ...args) => log("warn", message, ...args),
    error: (message, ...args) => log("error", message, ...args),
    child: (childPrefix) => createLogger(minLevel, `${prefix}${childPrefix}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
