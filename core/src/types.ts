/**
 * Core types shared by the orchestrator components.
 * @module
 */

// ============================================================================
// Timeline
// ============================================================================

/** Destination reserved for full connectivity-matrix replacements. */
export const CONNECTIVITY_DESTINATION = "-1";

/**
 * One authored step of the simulation.
 *
 * `destination` is either a node name or {@link CONNECTIVITY_DESTINATION}.
 */
export interface TimelineEvent {
  /** Logical time in seconds since simulation start */
  readonly timestamp: number;
  /** Node name, or "-1" for a connectivity update */
  readonly destination: string;
  /** Raw command line, or the connectivity bitstring */
  readonly payload: string;
  /** Line in the source file (1-based) */
  readonly line: number;
}

// ============================================================================
// Node protocol
// ============================================================================

/** A packet a node asked the network to transmit. */
export interface TransmitPacket {
  /** Length field as declared by the node, if it parsed as an integer */
  readonly declaredLength: number | null;
  /** Hex-encoded payload */
  readonly hexData: string;
}

/**
 * Classification of one line a node wrote to stdout.
 *
 * Push lines are routed; response lines feed the query slot.
 */
export type NodeOutput =
  | { readonly kind: "push"; readonly packet: TransmitPacket }
  | { readonly kind: "response"; readonly line: string }
  | { readonly kind: "malformed"; readonly line: string; readonly reason: string };

/** One entry of a node's neighbour table. */
export interface NodeStateEntry {
  readonly name: string;
  readonly timestamp: string;
  readonly latitude: string;
  readonly longitude: string;
}

/** Parsed `get_state` response. */
export interface NodeState {
  readonly uptimeMs: string;
  readonly entries: readonly NodeStateEntry[];
}

// ============================================================================
// Seams between components
// ============================================================================

/**
 * What the router needs from a node it forwards to.
 */
export interface RoutableNode {
  readonly name: string;
  /** Returns `false` when the line was dropped instead of written. */
  send(commandLine: string): boolean;
  queryState(timeoutMs: number): Promise<string | null>;
}

/**
 * Receives packets a node transmitted.
 */
export interface PacketDispatcher {
  deliver(source: string, hexData: string): readonly string[];
}

/**
 * Destination for whole lines (a file, the console, a test buffer).
 *
 * Each call carries exactly one line without its terminator; sinks must
 * write it in a single operation.
 */
export interface LineSink {
  writeLine(line: string): void;
  close?(): Promise<void>;
}

/**
 * Operator-facing diagnostics.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Source of elapsed simulation time.
 */
export interface SimClock {
  /** Seconds since simulation start */
  elapsed(): number;
}
