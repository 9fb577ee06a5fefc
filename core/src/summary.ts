/**
 * Final per-node summary printed when a run ends.
 * @module
 */

import { parseStateResponse } from "./protocol.ts";
import type { NodeState } from "./types.ts";

/** Why the running phase ended. */
export type StopReason = "duration" | "cancelled" | "timeline";

/** Drain-phase outcome for one node. */
export interface SummaryEntry {
  readonly node: string;
  /** Whether the node is in the run configuration */
  readonly configured: boolean;
  /** Raw `get_state` response, or `null` when absent */
  readonly response: string | null;
  /** Parsed response, when it parsed */
  readonly state: NodeState | null;
}

export interface SimulationSummary {
  readonly runId: string;
  readonly stoppedBy: StopReason;
  readonly entries: readonly SummaryEntry[];
}

/**
 * Build a summary entry from a drain-phase answer.
 */
export function summaryEntry(
  node: string,
  response: string | null,
  configured = true,
): SummaryEntry {
  return {
    node,
    configured,
    response,
    state: response === null ? null : parseStateResponse(response),
  };
}

const COLUMN_WIDTH = 10;

function row(name: string, ts: string, lat: string, lon: string): string {
  return `    ${name.padStart(4)} ${ts.padStart(COLUMN_WIDTH)} ${
    lat.padStart(COLUMN_WIDTH)
  } ${lon.padStart(COLUMN_WIDTH)}`;
}

/**
 * Uptime line, column header and one row per neighbour, indented for
 * nesting under a node heading.
 */
export function formatStateTable(state: NodeState): string[] {
  return [
    `    uptime ${state.uptimeMs} ms`,
    row("Node", "Timestamp", "Lat", "Lon"),
    ...state.entries.map((e) => row(e.name, e.timestamp, e.latitude, e.longitude)),
  ];
}

/**
 * Human-readable summary: one block per node with its neighbour table, or
 * `<no response>`.
 */
export function formatSummary(summary: SimulationSummary): string {
  const lines = [`Final node states (${summary.runId}, stopped by ${summary.stoppedBy}):`];

  for (const entry of summary.entries) {
    lines.push("", `${entry.node}:`);

    if (!entry.configured) {
      lines.push("  <no response> (not configured)");
      continue;
    }
    if (entry.response === null) {
      lines.push("  <no response>");
      continue;
    }
    if (entry.state === null) {
      lines.push(`  ${entry.response}`);
      continue;
    }

    lines.push(...formatStateTable(entry.state));
  }

  return lines.join("\n");
}
