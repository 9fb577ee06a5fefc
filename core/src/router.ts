/**
 * Connectivity Router: the reachability matrix and packet fan-out.
 * @module
 */

import { ConnectivityError, errorMessage } from "./errors.ts";
import { silentLogger } from "./logger.ts";
import { receivePacketCommand } from "./protocol.ts";
import type { EventLog } from "./records.ts";
import type { Logger, PacketDispatcher, RoutableNode, SimClock } from "./types.ts";

/** Default deadline of the state probe sent after each forward. */
export const DEFAULT_PROBE_TIMEOUT_MS = 200;

/**
 * Options for {@link ConnectivityRouter}.
 */
export interface RouterOptions {
  eventLog: EventLog;
  clock: SimClock;
  logger?: Logger;
  /**
   * Deadline for the `get_state` probe sent to each destination after a
   * forward; its answer is logged as a `state` record. 0 disables probing.
   */
  probeTimeoutMs?: number;
}

/** Row-major reachability; row i holds the destinations of node i. */
type Matrix = readonly (readonly boolean[])[];

/**
 * Owns the reachability matrix and the registry of live nodes.
 *
 * The matrix is an immutable snapshot swapped in whole on every update, so
 * a delivery always routes against one complete matrix: either the one
 * before an update or the one after it, never a mix.
 */
export class ConnectivityRouter implements PacketDispatcher {
  /** Configured node names; index i is row/column i of the matrix */
  readonly nodeNames: readonly string[];

  readonly #index: ReadonlyMap<string, number>;
  readonly #nodes = new Map<string, RoutableNode>();
  readonly #options: RouterOptions;
  readonly #logger: Logger;
  #matrix: Matrix;

  constructor(nodeNames: readonly string[], options: RouterOptions) {
    this.nodeNames = Object.freeze([...nodeNames]);
    this.#index = new Map(this.nodeNames.map((name, i) => [name, i]));
    this.#options = options;
    this.#logger = options.logger ?? silentLogger;
    this.#matrix = this.nodeNames.map(() => this.nodeNames.map(() => false));
  }

  /**
   * Number of configured nodes (N; bitstrings have N² entries).
   */
  get size(): number {
    return this.nodeNames.length;
  }

  /**
   * Add a node to the routing table. Only registered nodes receive packets.
   */
  register(node: RoutableNode): void {
    if (!this.#index.has(node.name)) {
      this.#logger.warn(
        `Registering '${node.name}', which has no row in the connectivity matrix`,
      );
    }
    this.#nodes.set(node.name, node);
  }

  /**
   * Look up a registered node.
   */
  node(name: string): RoutableNode | undefined {
    return this.#nodes.get(name);
  }

  /**
   * Replace the whole matrix from a row-major bitstring of length N².
   *
   * A bitstring of the wrong length, or with characters other than `0` and
   * `1`, is reported and leaves the matrix unchanged.
   *
   * @param timestamp - Logical time stamped on the `connectivity_update` record
   * @returns Whether the update was applied
   */
  updateConnectivity(bitstring: string, timestamp: number): boolean {
    const n = this.size;
    const expected = n * n;

    if (bitstring.length !== expected) {
      this.#report(
        new ConnectivityError(
          `connectivity string length ${bitstring.length} != ${n}^2`,
          expected,
          bitstring.length,
        ),
      );
      return false;
    }

    if (!/^[01]*$/.test(bitstring)) {
      this.#report(
        new ConnectivityError(
          `connectivity string must contain only 0 and 1: ${bitstring}`,
          expected,
          bitstring.length,
        ),
      );
      return false;
    }

    const next: boolean[][] = [];
    for (let i = 0; i < n; i++) {
      const row: boolean[] = [];
      for (let j = 0; j < n; j++) {
        row.push(bitstring[i * n + j] === "1");
      }
      next.push(row);
    }
    this.#matrix = next;

    this.#options.eventLog.append(
      { kind: "connectivity_update", matrix: bitstring },
      timestamp,
    );
    return true;
  }

  /**
   * Whether `source` currently reaches `destination` according to the matrix.
   */
  reachable(source: string, destination: string): boolean {
    const i = this.#index.get(source);
    const j = this.#index.get(destination);
    if (i === undefined || j === undefined) return false;
    return this.#matrix[i]?.[j] ?? false;
  }

  /**
   * Destinations reachable from `source`, excluding `source` itself.
   */
  reachableFrom(source: string): string[] {
    const row = this.#rowOf(source);
    return this.nodeNames.filter((name, j) => row[j] === true && name !== source);
  }

  /**
   * Forward a packet from `source` to every reachable, registered node other
   * than `source`, emitting one `forward` record per delivery.
   *
   * @returns The destinations the packet was forwarded to
   */
  deliver(source: string, hexData: string): readonly string[] {
    const row = this.#rowOf(source);
    const delivered: string[] = [];

    this.nodeNames.forEach((destination, j) => {
      if (row[j] !== true || destination === source) return;

      const node = this.#nodes.get(destination);
      if (!node) return;

      if (!node.send(receivePacketCommand(hexData))) return;
      const at = this.#options.clock.elapsed();
      this.#options.eventLog.append(
        { kind: "forward", source, destination, hexData },
        at,
      );
      delivered.push(destination);

      this.#probe(node, at);
    });

    return delivered;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  #rowOf(source: string): readonly boolean[] {
    // Read the snapshot once; an update during fan-out swaps in a new array.
    const matrix = this.#matrix;
    const i = this.#index.get(source);
    return i === undefined ? [] : (matrix[i] ?? []);
  }

  #probe(node: RoutableNode, at: number): void {
    const timeoutMs = this.#options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    if (timeoutMs <= 0) return;

    void node.queryState(timeoutMs).then(
      (response) => {
        if (response !== null) {
          this.#options.eventLog.append(
            { kind: "state", node: node.name, response },
            at,
          );
        }
      },
      (err: unknown) => {
        this.#logger.warn(
          `State probe of '${node.name}' failed: ${errorMessage(err)}`,
        );
      },
    );
  }

  #report(err: ConnectivityError): void {
    this.#logger.error(err.message);
  }
}
