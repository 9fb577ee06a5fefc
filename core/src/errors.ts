/**
 * Error types for the simulation orchestrator.
 * @module
 */

/**
 * Base error class for all orchestrator errors.
 *
 * All errors include a `code` property for programmatic error handling.
 */
export class SimulationError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, code = "UNKNOWN") {
    super(message);
    this.name = "SimulationError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a node process cannot be started.
 *
 * Common causes:
 * - Executable path does not exist
 * - Executable bit not set
 */
export class SpawnError extends SimulationError {
  /** Name of the node that failed to start */
  readonly node: string;
  /** Executable that was launched */
  readonly executable: string;

  constructor(node: string, executable: string, cause: string) {
    super(
      `Failed to start node '${node}' from ${executable}: ${cause}`,
      "SPAWN_FAILED",
    );
    this.name = "SpawnError";
    this.node = node;
    this.executable = executable;
  }
}

/**
 * Error describing a timeline line that could not be parsed.
 */
export class TimelineError extends SimulationError {
  /** 1-based line number in the timeline file */
  readonly line: number;

  constructor(message: string, line: number) {
    super(message, "TIMELINE_MALFORMED");
    this.name = "TimelineError";
    this.line = line;
  }
}

/**
 * Error describing a rejected connectivity update.
 */
export class ConnectivityError extends SimulationError {
  /** Length the bitstring needed */
  readonly expectedLength: number;
  /** Length the bitstring had */
  readonly actualLength: number;

  constructor(message: string, expectedLength: number, actualLength: number) {
    super(message, "CONNECTIVITY_INVALID");
    this.name = "ConnectivityError";
    this.expectedLength = expectedLength;
    this.actualLength = actualLength;
  }
}

/**
 * Error thrown when the run configuration is rejected.
 */
export class ValidationError extends SimulationError {
  /** The field that failed validation */
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Error thrown when a terminated supervisor is used again.
 */
export class DisposedError extends SimulationError {
  constructor(what: string) {
    super(`${what} has been terminated and cannot be used`, "DISPOSED");
    this.name = "DisposedError";
  }
}

/**
 * Render an unknown thrown value for diagnostics.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
