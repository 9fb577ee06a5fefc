/**
 * Simulation time.
 * @module
 */

import type { SimClock } from "./types.ts";

/**
 * Wall-clock elapsed time since construction.
 */
export class WallClock implements SimClock {
  readonly #startedAt: number;

  constructor(startedAt: number = performance.now()) {
    this.#startedAt = startedAt;
  }

  elapsed(): number {
    return (performance.now() - this.#startedAt) / 1000;
  }
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements SimClock {
  #now: number;

  constructor(now = 0) {
    this.#now = now;
  }

  elapsed(): number {
    return this.#now;
  }

  set(seconds: number): void {
    this.#now = seconds;
  }

  advance(seconds: number): void {
    this.#now += seconds;
  }
}

/**
 * Sleep for `ms`, resolving early (never rejecting) when `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/** Sleep function signature; injectable so tests can drive time. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
