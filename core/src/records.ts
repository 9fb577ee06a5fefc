/**
 * Event log records: the canonical, streamable record of a run.
 *
 * One record per line: `<elapsed_seconds>,<kind>,<fields...>`, elapsed time
 * with millisecond precision. The monitor tool and any other consumer parse
 * the same format with {@link parseRecord}.
 * @module
 */

import { FIELD_SEPARATOR, splitFields } from "./protocol.ts";
import type { LineSink, SimClock } from "./types.ts";

// ============================================================================
// Record Types
// ============================================================================

export type LogRecord =
  | { readonly kind: "initialized"; readonly node: string }
  | { readonly kind: "connectivity_update"; readonly matrix: string }
  | { readonly kind: "tx"; readonly source: string; readonly hexData: string }
  | {
    readonly kind: "forward";
    readonly source: string;
    readonly destination: string;
    readonly hexData: string;
  }
  | {
    readonly kind: "send_command";
    readonly destination: string;
    readonly command: string;
  }
  | { readonly kind: "state"; readonly node: string; readonly response: string };

export type LogRecordKind = LogRecord["kind"];

/** A record together with the time it was stamped with. */
export interface TimedRecord {
  readonly elapsed: number;
  readonly record: LogRecord;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Seconds with three decimals, as written in every record.
 */
export function formatElapsed(seconds: number): string {
  return seconds.toFixed(3);
}

function recordFields(record: LogRecord): string[] {
  switch (record.kind) {
    case "initialized":
      return [record.node];
    case "connectivity_update":
      return [record.matrix];
    case "tx":
      return [record.source, record.hexData];
    case "forward":
      return [record.source, record.destination, record.hexData];
    case "send_command":
      return [record.destination, record.command];
    case "state":
      return [record.node, record.response];
  }
}

/**
 * Render a record as one log line (without terminator).
 */
export function formatRecord(elapsed: number, record: LogRecord): string {
  return [formatElapsed(elapsed), record.kind, ...recordFields(record)].join(
    FIELD_SEPARATOR,
  );
}

/**
 * Parse one log line. Returns `null` for anything that is not a record.
 */
export function parseRecord(line: string): TimedRecord | null {
  const [ts, kind, rest] = splitFields(line, 3);
  if (kind === undefined || rest === undefined || ts === undefined) {
    return null;
  }

  const elapsed = Number(ts);
  if (ts.trim() === "" || !Number.isFinite(elapsed)) {
    return null;
  }

  const record = parseFields(kind, rest);
  return record ? { elapsed, record } : null;
}

function parseFields(kind: string, rest: string): LogRecord | null {
  switch (kind) {
    case "initialized":
      return { kind, node: rest };
    case "connectivity_update":
      return { kind, matrix: rest };
    case "tx": {
      const [source, hexData] = splitFields(rest, 2);
      return hexData === undefined ? null : { kind, source, hexData };
    }
    case "forward": {
      const [source, destination, hexData] = splitFields(rest, 3);
      return hexData === undefined
        ? null
        : { kind, source, destination, hexData };
    }
    case "send_command": {
      const [destination, command] = splitFields(rest, 2);
      return command === undefined ? null : { kind, destination, command };
    }
    case "state": {
      const [node, response] = splitFields(rest, 2);
      return response === undefined ? null : { kind, node, response };
    }
    default:
      return null;
  }
}

// ============================================================================
// Event Log
// ============================================================================

/**
 * Append-only event log fanned out to any number of line sinks.
 *
 * Each record reaches every sink as one whole line, so concurrent producers
 * never interleave partial lines.
 */
export class EventLog {
  readonly #clock: SimClock;
  readonly #sinks: LineSink[];

  constructor(clock: SimClock, sinks: LineSink[] = []) {
    this.#clock = clock;
    this.#sinks = [...sinks];
  }

  /**
   * Add a sink; it receives records appended from now on.
   */
  addSink(sink: LineSink): void {
    this.#sinks.push(sink);
  }

  /**
   * Append a record stamped with `at`, or the current elapsed time.
   *
   * @returns The line that was written.
   */
  append(record: LogRecord, at: number = this.#clock.elapsed()): string {
    const line = formatRecord(at, record);
    for (const sink of this.#sinks) {
      sink.writeLine(line);
    }
    return line;
  }

  /**
   * Close every sink that can be closed.
   */
  async close(): Promise<void> {
    await Promise.all(this.#sinks.map((sink) => sink.close?.()));
  }
}
