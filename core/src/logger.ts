/**
 * Operator-facing diagnostics.
 * @module
 */

import type { Logger } from "./types.ts";

/**
 * Console logger writing `[scope] message` lines.
 *
 * Everything goes to stderr so stdout stays a clean event log.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} WARN ${message}`),
    error: (message) => console.error(`${prefix} ERROR ${message}`),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger that records messages, for tests and summaries.
 */
export class RecordingLogger implements Logger {
  readonly entries: Array<{ level: "info" | "warn" | "error"; message: string }> = [];

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  /** Messages logged at `level`. */
  messages(level: "info" | "warn" | "error"): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}
