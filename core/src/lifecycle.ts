/**
 * Lifecycle Controller: spawn, run, drain, terminate.
 * @module
 */

import { typeid } from "typeid-js";

import { delay, type Sleep } from "./clock.ts";
import { planSpawns, type SimulationConfig } from "./config.ts";
import { errorMessage, SimulationError } from "./errors.ts";
import { silentLogger } from "./logger.ts";
import type { EventLog } from "./records.ts";
import { ConnectivityRouter } from "./router.ts";
import { EventScheduler, type SchedulerResult } from "./scheduler.ts";
import {
  type SimulationSummary,
  type StopReason,
  type SummaryEntry,
  summaryEntry,
} from "./summary.ts";
import { NodeSupervisor, type ProcessLauncher } from "./supervisor.ts";
import type { LineSink, Logger, SimClock, TimelineEvent } from "./types.ts";

/**
 * `idle → spawning → running → draining → terminated`
 */
export type LifecyclePhase =
  | "idle"
  | "spawning"
  | "running"
  | "draining"
  | "terminated";

/** Per-node log sinks opened for a freshly spawned node. */
export interface NodeLogs {
  stdout?: LineSink;
  stderr?: LineSink;
}

/**
 * Collaborators of a {@link SimulationController}.
 */
export interface ControllerDeps {
  clock: SimClock;
  eventLog: EventLog;
  logger?: Logger;
  /** Process launcher handed to every supervisor */
  launcher?: ProcessLauncher;
  /** Opens the per-node output logs; closed again at termination */
  openNodeLogs?: (node: string) => NodeLogs;
  /** Sleep implementation for spawn offsets and the duration timer */
  sleep?: Sleep;
  /** Run identifier (default: a fresh `run_…` TypeID) */
  runId?: string;
}

/**
 * Drives one simulation run.
 *
 * @example
 * ```typescript
 * const controller = new SimulationController(config, { clock, eventLog });
 * const summary = await controller.run(timeline.events, shutdown);
 * console.log(formatSummary(summary));
 * ```
 */
export class SimulationController {
  readonly runId: string;
  readonly router: ConnectivityRouter;

  readonly #config: SimulationConfig;
  readonly #deps: ControllerDeps;
  readonly #logger: Logger;
  readonly #sleep: Sleep;
  readonly #supervisors = new Map<string, NodeSupervisor>();
  readonly #nodeLogs: LineSink[] = [];
  #phase: LifecyclePhase = "idle";
  #stoppedBy: StopReason | null = null;
  #schedulerResult: SchedulerResult | null = null;

  constructor(config: SimulationConfig, deps: ControllerDeps) {
    this.runId = deps.runId ?? typeid("run").toString();
    this.#config = config;
    this.#deps = deps;
    this.#logger = deps.logger ?? silentLogger;
    this.#sleep = deps.sleep ?? delay;
    this.router = new ConnectivityRouter(config.nodes, {
      eventLog: deps.eventLog,
      clock: deps.clock,
      logger: this.#logger,
      probeTimeoutMs: config.probeTimeoutMs,
    });
  }

  /** Current lifecycle phase. */
  get phase(): LifecyclePhase {
    return this.#phase;
  }

  /** Scheduler outcome, once the running phase is over. */
  get schedulerResult(): SchedulerResult | null {
    return this.#schedulerResult;
  }

  /** Supervisor of a spawned node. */
  supervisor(name: string): NodeSupervisor | undefined {
    return this.#supervisors.get(name);
  }

  /**
   * Run the whole lifecycle once.
   *
   * A node that fails to spawn aborts the run: nodes already started are
   * terminated and the {@link SpawnError} propagates. Everything after
   * spawning is recoverable.
   *
   * @param signal - Cancellation (interactive stop, SIGINT, ...)
   */
  async run(
    timeline: readonly TimelineEvent[],
    signal?: AbortSignal,
  ): Promise<SimulationSummary> {
    if (this.#phase !== "idle") {
      throw new SimulationError(
        `Controller already ${this.#phase}; a run cannot be repeated`,
        "INVALID_STATE",
      );
    }

    try {
      this.#phase = "spawning";
      await this.#spawnAll(signal);

      this.#phase = "running";
      if (signal?.aborted) {
        this.#stoppedBy = "cancelled";
      } else {
        this.#schedulerResult = await this.#runUntilStopped(timeline, signal);
      }

      this.#phase = "draining";
      const entries = await this.#drain(
        this.#schedulerResult?.unknownDestinations ?? [],
      );

      return {
        runId: this.runId,
        stoppedBy: this.#stoppedBy ?? "cancelled",
        entries,
      };
    } finally {
      await this.#terminateAll();
    }
  }

  // ============================================================================
  // Phases
  // ============================================================================

  async #spawnAll(signal?: AbortSignal): Promise<void> {
    const { clock, eventLog } = this.#deps;

    for (const slot of planSpawns(this.#config)) {
      const wait = slot.offset - clock.elapsed();
      if (wait > 0) {
        await this.#sleep(wait * 1000, signal);
      }
      if (signal?.aborted) {
        this.#logger.info("Cancelled while spawning; remaining nodes skipped");
        return;
      }

      const logs = this.#deps.openNodeLogs?.(slot.name) ?? {};
      for (const sink of [logs.stdout, logs.stderr]) {
        if (sink) this.#nodeLogs.push(sink);
      }

      const supervisor = await NodeSupervisor.spawn(slot.name, {
        executable: this.#config.nodeExecutable,
        dispatcher: this.router,
        eventLog,
        clock,
        stdoutLog: logs.stdout,
        stderrLog: logs.stderr,
        logger: this.#logger,
        launcher: this.#deps.launcher,
      });

      this.#supervisors.set(slot.name, supervisor);
      this.router.register(supervisor);
      eventLog.append({ kind: "initialized", node: slot.name });
    }
  }

  async #runUntilStopped(
    timeline: readonly TimelineEvent[],
    signal?: AbortSignal,
  ): Promise<SchedulerResult> {
    const stop = new AbortController();
    const stopWith = (reason: StopReason) => {
      if (this.#stoppedBy === null) {
        this.#stoppedBy = reason;
        stop.abort();
      }
    };
    const onCancel = () => stopWith("cancelled");
    signal?.addEventListener("abort", onCancel, { once: true });

    try {
      const scheduler = new EventScheduler(timeline, {
        router: this.router,
        eventLog: this.#deps.eventLog,
        clock: this.#deps.clock,
        logger: this.#logger,
        sleep: this.#sleep,
      });
      const schedulerRun = scheduler.run(stop.signal);

      // A failing scheduler ends the run; its error surfaces below.
      void schedulerRun.then(
        () => {
          if (this.#config.stopWhenTimelineEnds) stopWith("timeline");
        },
        () => stopWith("cancelled"),
      );

      const { durationSeconds } = this.#config;
      if (durationSeconds !== null) {
        void this.#sleep(durationSeconds * 1000, stop.signal).then(() =>
          stopWith("duration")
        );
      }

      await new Promise<void>((resolve) => {
        if (stop.signal.aborted) resolve();
        else stop.signal.addEventListener("abort", () => resolve(), { once: true });
      });
      this.#logger.info(`Stopping: ${this.#stoppedBy ?? "cancelled"}`);

      return await schedulerRun;
    } finally {
      signal?.removeEventListener("abort", onCancel);
    }
  }

  async #drain(unknownDestinations: readonly string[]): Promise<SummaryEntry[]> {
    const entries: SummaryEntry[] = [];

    for (const name of this.#config.nodes) {
      const supervisor = this.#supervisors.get(name);
      if (!supervisor) {
        this.#logger.warn(`Node '${name}' was never spawned`);
        entries.push(summaryEntry(name, null));
        continue;
      }

      let response: string | null = null;
      try {
        response = await supervisor.queryState(this.#config.queryTimeoutMs);
      } catch (err) {
        this.#logger.warn(`State query of '${name}' failed: ${errorMessage(err)}`);
      }
      if (response === null) {
        this.#logger.warn(`No state from '${name}' within ${this.#config.queryTimeoutMs} ms`);
      }
      entries.push(summaryEntry(name, response));
    }

    for (const name of unknownDestinations) {
      if (!this.#config.nodes.includes(name)) {
        entries.push(summaryEntry(name, null, false));
      }
    }

    return entries;
  }

  async #terminateAll(): Promise<void> {
    for (const supervisor of this.#supervisors.values()) {
      supervisor.terminate();
    }

    const closing = this.#nodeLogs.map((sink) => sink.close?.());
    this.#nodeLogs.length = 0;
    await Promise.all(closing);

    this.#phase = "terminated";
  }
}
