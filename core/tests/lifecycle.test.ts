import { beforeEach, describe, expect, it } from "vitest";

import { ManualClock } from "../src/clock.ts";
import type { SimulationConfig } from "../src/config.ts";
import { SimulationError, SpawnError } from "../src/errors.ts";
import { type ControllerDeps, SimulationController } from "../src/lifecycle.ts";
import { RecordingLogger } from "../src/logger.ts";
import { EventLog } from "../src/records.ts";
import { MemorySink } from "../src/sinks.ts";
import type { ProcessLauncher } from "../src/supervisor.ts";
import type { TimelineEvent } from "../src/types.ts";
import { FakeProcess, fakeLauncher, type Responder, stateResponder } from "./fakes.ts";

function config(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return {
    nodes: ["A", "B"],
    nodeExecutable: "./fake-node",
    durationSeconds: null,
    spawnOffsets: [0, 0],
    spawnMaxSeconds: 0,
    seed: 0,
    stopWhenTimelineEnds: true,
    queryTimeoutMs: 500,
    probeTimeoutMs: 0,
    ...overrides,
  };
}

/** Transmits DEAD when told to `send DEAD`, answers `get_state`. */
const meshNode: Responder = (command, node) => {
  if (command === "send DEAD") node.emit("transmit_packet,2,DEAD");
  if (command === "get_state") node.emit("get_state,100");
};

describe("SimulationController", () => {
  let clock: ManualClock;
  let sink: MemorySink;
  let logger: RecordingLogger;

  function deps(launcher: ProcessLauncher, extra: Partial<ControllerDeps> = {}): ControllerDeps {
    return {
      clock,
      eventLog: new EventLog(clock, [sink]),
      logger,
      launcher,
      runId: "run_test",
      ...extra,
    };
  }

  beforeEach(() => {
    clock = new ManualClock();
    sink = new MemorySink();
    logger = new RecordingLogger();
  });

  it("runs a timeline end to end", async () => {
    const { launcher, processes } = fakeLauncher(meshNode);
    const controller = new SimulationController(config(), deps(launcher));
    const timeline: TimelineEvent[] = [
      { timestamp: 0, destination: "-1", payload: "0110", line: 1 },
      { timestamp: 0, destination: "A", payload: "send DEAD", line: 2 },
      { timestamp: 0, destination: "C", payload: "hello", line: 3 },
    ];

    const summary = await controller.run(timeline);

    expect(sink.lines).toEqual([
      "0.000,initialized,A",
      "0.000,initialized,B",
      "0.000,connectivity_update,0110",
      "0.000,send_command,A,send DEAD",
      "0.000,tx,A,DEAD",
      "0.000,forward,A,B,DEAD",
    ]);
    expect(processes[1]?.received).toEqual([
      "network_receive_packet,DEAD",
      "get_state",
    ]);
    expect(summary).toEqual({
      runId: "run_test",
      stoppedBy: "timeline",
      entries: [
        {
          node: "A",
          configured: true,
          response: "get_state,100",
          state: { uptimeMs: "100", entries: [] },
        },
        {
          node: "B",
          configured: true,
          response: "get_state,100",
          state: { uptimeMs: "100", entries: [] },
        },
        { node: "C", configured: false, response: null, state: null },
      ],
    });
    expect(logger.messages("warn")).toEqual([
      "Unknown destination 'C' at ts 0 (line 3)",
    ]);
    expect(controller.schedulerResult).toEqual({
      applied: 2,
      skipped: 1,
      completed: true,
      unknownDestinations: ["C"],
    });
    expect(controller.phase).toBe("terminated");
    expect(processes.every((p) => p.killed)).toBe(true);
  });

  it("spawns nodes at their offsets", async () => {
    const { launcher } = fakeLauncher(stateResponder());
    const sleeps: number[] = [];
    const controller = new SimulationController(
      config({ spawnOffsets: [2, 0] }),
      deps(launcher, {
        sleep: (ms) => {
          sleeps.push(ms);
          clock.advance(ms / 1000);
          return Promise.resolve();
        },
      }),
    );

    await controller.run([]);

    expect(sleeps).toEqual([2000]);
    expect(sink.lines).toEqual(["0.000,initialized,B", "2.000,initialized,A"]);
  });

  it("terminates started nodes when a spawn fails", async () => {
    const started: FakeProcess[] = [];
    const launcher: ProcessLauncher = () => {
      if (started.length > 0) {
        return Promise.reject(new Error("permission denied"));
      }
      const child = new FakeProcess();
      started.push(child);
      return Promise.resolve(child);
    };
    const controller = new SimulationController(config(), deps(launcher));

    await expect(controller.run([])).rejects.toBeInstanceOf(SpawnError);

    expect(started[0]?.killed).toBe(true);
    expect(controller.phase).toBe("terminated");
    expect(sink.lines).toEqual(["0.000,initialized,A"]);
  });

  it("skips spawning and reports nobody when cancelled up front", async () => {
    const { launcher, processes } = fakeLauncher();
    const controller = new SimulationController(config(), deps(launcher));
    const cancel = new AbortController();
    cancel.abort();

    const summary = await controller.run([], cancel.signal);

    expect(processes).toEqual([]);
    expect(summary.stoppedBy).toBe("cancelled");
    expect(summary.entries.map((e) => e.response)).toEqual([null, null]);
    expect(logger.messages("warn")).toEqual([
      "Node 'A' was never spawned",
      "Node 'B' was never spawned",
    ]);
  });

  it("stops after the configured duration", async () => {
    const { launcher } = fakeLauncher(stateResponder("7"));
    const controller = new SimulationController(
      config({ durationSeconds: 0.05, stopWhenTimelineEnds: false }),
      deps(launcher),
    );

    const summary = await controller.run([]);

    expect(summary.stoppedBy).toBe("duration");
    expect(summary.entries.map((e) => e.response)).toEqual([
      "get_state,7",
      "get_state,7",
    ]);
    expect(logger.messages("info")).toContain("Stopping: duration");
  });

  it("stops on cancellation while running", async () => {
    const { launcher } = fakeLauncher(stateResponder());
    const controller = new SimulationController(
      config({ stopWhenTimelineEnds: false }),
      deps(launcher),
    );
    const cancel = new AbortController();
    setTimeout(() => cancel.abort(), 20);

    const summary = await controller.run([], cancel.signal);

    expect(summary.stoppedBy).toBe("cancelled");
    expect(summary.entries).toHaveLength(2);
  });

  it("reports nodes that do not answer the final query", async () => {
    const { launcher } = fakeLauncher();
    const controller = new SimulationController(
      config({ nodes: ["A"], spawnOffsets: [0], queryTimeoutMs: 50 }),
      deps(launcher),
    );

    const summary = await controller.run([]);

    expect(summary.entries).toEqual([
      { node: "A", configured: true, response: null, state: null },
    ]);
    expect(logger.messages("warn")).toEqual(["No state from 'A' within 50 ms"]);
  });

  it("writes and closes per-node logs", async () => {
    const { launcher } = fakeLauncher(stateResponder());
    const logs = new Map<string, MemorySink>();
    const controller = new SimulationController(
      config({ nodes: ["A"], spawnOffsets: [0] }),
      deps(launcher, {
        openNodeLogs: (node) => {
          const stdout = new MemorySink();
          logs.set(node, stdout);
          return { stdout };
        },
      }),
    );

    await controller.run([]);

    expect(logs.get("A")?.lines).toEqual(["0.000,get_state,100"]);
    expect(logs.get("A")?.closed).toBe(true);
  });

  it("runs only once", async () => {
    const { launcher } = fakeLauncher(stateResponder());
    const controller = new SimulationController(config(), deps(launcher));
    await controller.run([]);

    const again = controller.run([]);
    await expect(again).rejects.toBeInstanceOf(SimulationError);
    await expect(again).rejects.toMatchObject({ code: "INVALID_STATE" });
  });

  it("names runs with a TypeID by default", () => {
    const { launcher } = fakeLauncher();
    const controller = new SimulationController(config(), {
      clock,
      eventLog: new EventLog(clock),
      launcher,
    });

    expect(controller.runId).toMatch(/^run_[0-9a-z]{26}$/);
  });
});
