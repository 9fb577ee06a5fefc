/**
 * Types for the event log monitor.
 * @module
 */

import type { NodeState } from "../../core/src/types.ts";

/** What each node panel shows. */
export type MonitorMode = "events" | "state";

/** Direction of a packet event, seen from the panel's node. */
export type PacketDirection = "TX" | "RX";

/** One packet event in a node panel. */
export interface PacketEvent {
  /** Elapsed seconds stamped on the record. */
  elapsed: number;
  direction: PacketDirection;
  /** Other end of the packet; empty for the raw transmission. */
  peer: string;
}

/** Everything the monitor knows about one node. */
export interface NodeView {
  name: string;
  /** When the node was started, if seen. */
  initializedAt: number | null;
  /** Nodes that can currently reach this one. */
  peersIn: Set<string>;
  /** Most recent packet events, oldest first. */
  events: PacketEvent[];
  /** Last state answer, if any. */
  lastState: NodeState | null;
}
