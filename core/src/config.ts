/**
 * Run configuration and spawn planning.
 * @module
 */

import { ValidationError } from "./errors.ts";
import { CONNECTIVITY_DESTINATION } from "./types.ts";

/** Default drain-phase query deadline. */
export const DEFAULT_QUERY_TIMEOUT_MS = 1000;

/** Default upper bound of random spawn offsets, in seconds. */
export const DEFAULT_SPAWN_MAX_SECONDS = 5;

/** Node names used when none are given. */
export const DEFAULT_NODES: readonly string[] = ["ND01", "ND02", "ND03", "ND04"];

/**
 * Everything a run needs to know up front.
 */
export interface SimulationConfig {
  /** Node names, in configuration order (also matrix order) */
  nodes: readonly string[];
  /** Program started once per node */
  nodeExecutable: string;
  /** Stop after this many seconds of running; `null` waits for cancellation */
  durationSeconds: number | null;
  /** Per-node spawn offsets in seconds, aligned with `nodes` */
  spawnOffsets: readonly number[] | null;
  /** Upper bound of random offsets when `spawnOffsets` is `null` */
  spawnMaxSeconds: number;
  /** Seed for random offsets */
  seed: number;
  /** Stop once every timeline event has been applied */
  stopWhenTimelineEnds: boolean;
  /** Deadline of each drain-phase `get_state` */
  queryTimeoutMs: number;
  /** Deadline of the post-forward probe; 0 disables it */
  probeTimeoutMs: number;
}

/**
 * Check a configuration, throwing on the first problem found.
 *
 * @throws {ValidationError} Naming the offending field
 */
export function validateConfig(config: SimulationConfig): SimulationConfig {
  if (config.nodes.length === 0) {
    throw new ValidationError("At least one node is required", "nodes");
  }

  const seen = new Set<string>();
  for (const name of config.nodes) {
    if (name === "" || name.includes(",") || name === CONNECTIVITY_DESTINATION) {
      throw new ValidationError(`Invalid node name '${name}'`, "nodes");
    }
    if (seen.has(name)) {
      throw new ValidationError(`Duplicate node name '${name}'`, "nodes");
    }
    seen.add(name);
  }

  if (config.nodeExecutable.trim() === "") {
    throw new ValidationError("Node executable is required", "nodeExecutable");
  }

  if (
    config.durationSeconds !== null &&
    !(Number.isFinite(config.durationSeconds) && config.durationSeconds >= 0)
  ) {
    throw new ValidationError(
      `Duration must be a non-negative number of seconds, got ${config.durationSeconds}`,
      "durationSeconds",
    );
  }

  if (config.spawnOffsets !== null) {
    if (config.spawnOffsets.length !== config.nodes.length) {
      throw new ValidationError(
        `--spawn-offsets length ${config.spawnOffsets.length} != number of nodes ${config.nodes.length}`,
        "spawnOffsets",
      );
    }
    if (config.spawnOffsets.some((o) => !Number.isFinite(o) || o < 0)) {
      throw new ValidationError(
        "Spawn offsets must be non-negative numbers",
        "spawnOffsets",
      );
    }
  }

  if (!(config.spawnMaxSeconds >= 0)) {
    throw new ValidationError(
      `Spawn max must be non-negative, got ${config.spawnMaxSeconds}`,
      "spawnMaxSeconds",
    );
  }

  for (const field of ["queryTimeoutMs", "probeTimeoutMs"] as const) {
    if (!(config[field] >= 0)) {
      throw new ValidationError(`${field} must be non-negative`, field);
    }
  }

  return config;
}

// ============================================================================
// Spawn Planning
// ============================================================================

/** When a node is started, in seconds since simulation start. */
export interface SpawnSlot {
  readonly name: string;
  readonly offset: number;
}

/**
 * Deterministic PRNG returning floats in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Spawn order: explicit offsets or seeded uniform offsets in
 * `[0, spawnMaxSeconds)`, ascending; ties keep configuration order.
 */
export function planSpawns(config: SimulationConfig): SpawnSlot[] {
  let offsets: readonly number[];
  if (config.spawnOffsets !== null) {
    offsets = config.spawnOffsets;
  } else {
    const rng = mulberry32(config.seed);
    offsets = config.nodes.map(() => rng() * config.spawnMaxSeconds);
  }

  return config.nodes
    .map((name, i) => ({ name, offset: offsets[i] ?? 0 }))
    .sort((a, b) => a.offset - b.offset);
}
