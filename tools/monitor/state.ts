/**
 * Monitor state: folds event log records into per-node views.
 * @module
 */

import { parseStateResponse } from "../../core/src/protocol.ts";
import { parseRecord, type TimedRecord } from "../../core/src/records.ts";
import type { NodeView, PacketEvent } from "./types.ts";

/** Packet events kept per node. */
export const EVENTS_PER_NODE = 5;

/**
 * Per-node view of a run, rebuilt from its event log.
 *
 * `nodes` must be given in the orchestrator's configuration order: bit
 * `i * N + j` of a connectivity update means node i reaches node j.
 */
export class MonitorState {
  readonly #order: readonly string[];
  readonly #views = new Map<string, NodeView>();

  constructor(nodes: readonly string[]) {
    this.#order = [...nodes];
    for (const name of nodes) {
      this.#viewOf(name);
    }
  }

  /**
   * Fold one log line. Returns whether it was a record.
   */
  handleLine(line: string): boolean {
    const timed = parseRecord(line);
    if (!timed) return false;
    this.handleRecord(timed);
    return true;
  }

  /**
   * Fold one parsed record.
   */
  handleRecord({ elapsed, record }: TimedRecord): void {
    switch (record.kind) {
      case "initialized":
        this.#viewOf(record.node).initializedAt = elapsed;
        break;

      case "connectivity_update":
        this.handleConnectivity(record.matrix);
        break;

      case "tx":
        this.#push(record.source, { elapsed, direction: "TX", peer: "" });
        break;

      case "forward":
        this.#push(record.source, {
          elapsed,
          direction: "TX",
          peer: record.destination,
        });
        this.#push(record.destination, {
          elapsed,
          direction: "RX",
          peer: record.source,
        });
        break;

      case "state":
        this.#viewOf(record.node).lastState = parseStateResponse(record.response);
        break;

      case "send_command":
        break;
    }
  }

  /**
   * Recompute incoming peers from a row-major bitstring. A bitstring that
   * does not match the node count is ignored.
   */
  handleConnectivity(matrix: string): void {
    const n = this.#order.length;
    if (matrix.length !== n * n) return;

    this.#order.forEach((source, i) => {
      this.#order.forEach((destination, j) => {
        const peers = this.#viewOf(destination).peersIn;
        if (matrix[i * n + j] === "1") {
          peers.add(source);
        } else {
          peers.delete(source);
        }
      });
    });
  }

  /**
   * Look up a node's view.
   */
  view(name: string): NodeView | undefined {
    return this.#views.get(name);
  }

  /**
   * All views: configured nodes first, then any others in order of
   * appearance.
   */
  views(): NodeView[] {
    return [...this.#views.values()];
  }

  #viewOf(name: string): NodeView {
    let view = this.#views.get(name);
    if (!view) {
      view = {
        name,
        initializedAt: null,
        peersIn: new Set(),
        events: [],
        lastState: null,
      };
      this.#views.set(name, view);
    }
    return view;
  }

  #push(name: string, event: PacketEvent): void {
    const { events } = this.#viewOf(name);
    events.push(event);
    if (events.length > EVENTS_PER_NODE) {
      events.splice(0, events.length - EVENTS_PER_NODE);
    }
  }
}
