/**
 * Event Scheduler: replays the timeline against wall-clock time.
 * @module
 */

import { delay, type Sleep } from "./clock.ts";
import { silentLogger } from "./logger.ts";
import type { EventLog } from "./records.ts";
import type { ConnectivityRouter } from "./router.ts";
import {
  CONNECTIVITY_DESTINATION,
  type Logger,
  type SimClock,
  type TimelineEvent,
} from "./types.ts";

/**
 * Options for {@link EventScheduler}.
 */
export interface SchedulerOptions {
  router: ConnectivityRouter;
  eventLog: EventLog;
  clock: SimClock;
  logger?: Logger;
  /** Sleep implementation (default: {@link delay}) */
  sleep?: Sleep;
}

/** Outcome of a scheduler run. */
export interface SchedulerResult {
  /** Events applied (connectivity updates count even when rejected) */
  readonly applied: number;
  /** Events dropped because their destination is unknown */
  readonly skipped: number;
  /** Whether every event was reached before the stop signal */
  readonly completed: boolean;
  /** Destinations referenced by the timeline that no node answers to */
  readonly unknownDestinations: readonly string[];
}

/**
 * Walks a time-sorted timeline, sleeping until each event's timestamp.
 *
 * Late events fire immediately, keeping order but not wall-clock fidelity.
 * Once the stop signal aborts, a pending sleep ends and no further event is
 * applied.
 */
export class EventScheduler {
  readonly #events: readonly TimelineEvent[];
  readonly #options: SchedulerOptions;
  readonly #logger: Logger;
  readonly #sleep: Sleep;

  constructor(events: readonly TimelineEvent[], options: SchedulerOptions) {
    this.#events = events;
    this.#options = options;
    this.#logger = options.logger ?? silentLogger;
    this.#sleep = options.sleep ?? delay;
  }

  /**
   * Apply every event in order until done or `signal` aborts.
   */
  async run(signal?: AbortSignal): Promise<SchedulerResult> {
    let applied = 0;
    let skipped = 0;
    const unknown = new Set<string>();

    for (const event of this.#events) {
      if (signal?.aborted) break;

      const wait = event.timestamp - this.#options.clock.elapsed();
      if (wait > 0) {
        await this.#sleep(wait * 1000, signal);
        if (signal?.aborted) break;
      }

      if (this.#apply(event)) {
        applied++;
      } else {
        skipped++;
        unknown.add(event.destination);
      }
    }

    return {
      applied,
      skipped,
      completed: applied + skipped === this.#events.length,
      unknownDestinations: [...unknown],
    };
  }

  #apply(event: TimelineEvent): boolean {
    const { router, eventLog } = this.#options;

    if (event.destination === CONNECTIVITY_DESTINATION) {
      router.updateConnectivity(event.payload, event.timestamp);
      return true;
    }

    const node = router.node(event.destination);
    if (!node) {
      this.#logger.warn(
        `Unknown destination '${event.destination}' at ts ${event.timestamp} (line ${event.line})`,
      );
      return false;
    }

    node.send(event.payload);
    eventLog.append(
      {
        kind: "send_command",
        destination: event.destination,
        command: event.payload,
      },
      event.timestamp,
    );
    return true;
  }
}
