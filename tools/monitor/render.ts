/**
 * Text rendering of the monitor view.
 * @module
 */

import { formatStateTable } from "../../core/src/summary.ts";
import type { MonitorState } from "./state.ts";
import type { MonitorMode, NodeView, PacketEvent } from "./types.ts";

/** Clears the terminal and homes the cursor. */
export const CLEAR_SCREEN = "\x1b[2J\x1b[H";

function formatEvent(event: PacketEvent): string {
  const arrow = event.direction === "TX" ? "→" : "←";
  return ` ${event.elapsed.toFixed(3).padStart(6)}s ${arrow} ${event.peer}`.trimEnd();
}

/**
 * Lines of one node panel.
 */
export function renderPanel(view: NodeView, mode: MonitorMode): string[] {
  const title = view.initializedAt === null
    ? `== ${view.name} (not started) ==`
    : `== ${view.name} (up since ${view.initializedAt.toFixed(3)}s) ==`;
  const lines = [title];

  if (mode === "events") {
    const peers = [...view.peersIn].sort();
    lines.push(`Peers in: ${peers.length > 0 ? peers.join(", ") : "<none>"}`);
    lines.push("Last events:");
    lines.push(...view.events.map(formatEvent));
  } else if (view.lastState === null) {
    lines.push("  <no state yet>");
  } else {
    lines.push(...formatStateTable(view.lastState));
  }

  return lines;
}

/**
 * The whole view: one panel per node, separated by blank lines.
 */
export function renderView(state: MonitorState, mode: MonitorMode): string {
  return state
    .views()
    .map((view) => renderPanel(view, mode).join("\n"))
    .join("\n\n");
}
