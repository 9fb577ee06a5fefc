/**
 * meshsim - orchestrates one process per simulated network node.
 *
 * Each node is an external program speaking a line protocol on
 * stdin/stdout. The orchestrator replays an authored timeline, routes every
 * transmitted packet over a time-varying connectivity matrix and writes one
 * streamable event log:
 * - {@link SimulationController}: spawn, run, drain and terminate
 * - {@link ConnectivityRouter}: the reachability matrix and packet fan-out
 * - {@link NodeSupervisor}: one node process and its query slot
 * - {@link EventScheduler}: timeline replay against wall-clock time
 *
 * @example
 * ```typescript
 * import {
 *   EventLog,
 *   fileSink,
 *   formatSummary,
 *   loadTimeline,
 *   SimulationController,
 *   WallClock,
 *   withShutdown,
 * } from "meshsim";
 *
 * const clock = new WallClock();
 * const eventLog = new EventLog(clock, [fileSink("sim_output.log")]);
 * const { events } = await loadTimeline("timeline.csv");
 *
 * const controller = new SimulationController(config, { clock, eventLog });
 * const summary = await withShutdown((shutdown) =>
 *   controller.run(events, shutdown)
 * );
 * console.log(formatSummary(summary));
 * ```
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

export { CONNECTIVITY_DESTINATION } from "./src/types.ts";
export type {
  LineSink,
  Logger,
  NodeOutput,
  NodeState,
  NodeStateEntry,
  PacketDispatcher,
  RoutableNode,
  SimClock,
  TimelineEvent,
  TransmitPacket,
} from "./src/types.ts";

// ============================================================================
// Protocol
// ============================================================================

export {
  classifyLine,
  CMD_GET_STATE,
  CMD_RECEIVE_PACKET,
  FIELD_SEPARATOR,
  isStateResponse,
  parseStateResponse,
  PUSH_TRANSMIT_PACKET,
  receivePacketCommand,
  splitFields,
} from "./src/protocol.ts";

// ============================================================================
// Components
// ============================================================================

export { SimulationController } from "./src/lifecycle.ts";
export type {
  ControllerDeps,
  LifecyclePhase,
  NodeLogs,
} from "./src/lifecycle.ts";

export { ConnectivityRouter, DEFAULT_PROBE_TIMEOUT_MS } from "./src/router.ts";
export type { RouterOptions } from "./src/router.ts";

export { launchProcess, NodeSupervisor } from "./src/supervisor.ts";
export type {
  NodeProcess,
  ProcessLauncher,
  SupervisorOptions,
} from "./src/supervisor.ts";

export { EventScheduler } from "./src/scheduler.ts";
export type { SchedulerOptions, SchedulerResult } from "./src/scheduler.ts";

export { ResponseSlot } from "./src/slot.ts";

// ============================================================================
// Timeline & Configuration
// ============================================================================

export { loadTimeline, parseTimeline } from "./src/timeline.ts";
export type { ParsedTimeline } from "./src/timeline.ts";

export {
  DEFAULT_NODES,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_SPAWN_MAX_SECONDS,
  mulberry32,
  planSpawns,
  validateConfig,
} from "./src/config.ts";
export type { SimulationConfig, SpawnSlot } from "./src/config.ts";

// ============================================================================
// Event Log & Sinks
// ============================================================================

export {
  EventLog,
  formatElapsed,
  formatRecord,
  parseRecord,
} from "./src/records.ts";
export type { LogRecord, LogRecordKind, TimedRecord } from "./src/records.ts";

export { fileSink, MemorySink, StreamSink } from "./src/sinks.ts";

export { delay, ManualClock, WallClock } from "./src/clock.ts";
export type { Sleep } from "./src/clock.ts";

export { createLogger, RecordingLogger, silentLogger } from "./src/logger.ts";

// ============================================================================
// Summary
// ============================================================================

export {
  formatStateTable,
  formatSummary,
  summaryEntry,
} from "./src/summary.ts";
export type {
  SimulationSummary,
  StopReason,
  SummaryEntry,
} from "./src/summary.ts";

// ============================================================================
// Errors
// ============================================================================

export {
  ConnectivityError,
  DisposedError,
  errorMessage,
  SimulationError,
  SpawnError,
  TimelineError,
  ValidationError,
} from "./src/errors.ts";

// ============================================================================
// Helpers
// ============================================================================

export { listenForStopKey, withShutdown } from "./src/helpers.ts";
export type { RunFn, ShutdownOptions } from "./src/helpers.ts";
