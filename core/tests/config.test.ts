import { describe, expect, it } from "vitest";

import {
  mulberry32,
  planSpawns,
  type SimulationConfig,
  validateConfig,
} from "../src/config.ts";
import { ValidationError } from "../src/errors.ts";

function config(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return {
    nodes: ["A", "B", "C"],
    nodeExecutable: "./fake-node",
    durationSeconds: null,
    spawnOffsets: null,
    spawnMaxSeconds: 5,
    seed: 0,
    stopWhenTimelineEnds: false,
    queryTimeoutMs: 1000,
    probeTimeoutMs: 200,
    ...overrides,
  };
}

describe("validateConfig", () => {
  it("accepts a sound configuration", () => {
    const valid = config({ durationSeconds: 10, spawnOffsets: [0, 1, 2] });
    expect(validateConfig(valid)).toBe(valid);
  });

  const invalid: Array<[Partial<SimulationConfig>, string, string]> = [
    [{ nodes: [] }, "nodes", "At least one node is required"],
    [{ nodes: ["A", "A"] }, "nodes", "Duplicate node name 'A'"],
    [{ nodes: ["A", "-1"] }, "nodes", "Invalid node name '-1'"],
    [{ nodes: ["A,B"] }, "nodes", "Invalid node name 'A,B'"],
    [{ nodeExecutable: " " }, "nodeExecutable", "Node executable is required"],
    [
      { durationSeconds: -1 },
      "durationSeconds",
      "Duration must be a non-negative number of seconds, got -1",
    ],
    [
      { spawnOffsets: [0, 1] },
      "spawnOffsets",
      "--spawn-offsets length 2 != number of nodes 3",
    ],
    [
      { spawnOffsets: [0, -1, 2] },
      "spawnOffsets",
      "Spawn offsets must be non-negative numbers",
    ],
    [
      { spawnMaxSeconds: Number.NaN },
      "spawnMaxSeconds",
      "Spawn max must be non-negative, got NaN",
    ],
    [{ queryTimeoutMs: -5 }, "queryTimeoutMs", "queryTimeoutMs must be non-negative"],
  ];

  it.each(invalid)(
    "rejects %o",
    (overrides, field, message) => {
      let caught: unknown;
      try {
        validateConfig(config(overrides));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({ field, message, code: "VALIDATION_ERROR" });
    },
  );
});

describe("planSpawns", () => {
  it("orders explicit offsets ascending", () => {
    expect(planSpawns(config({ spawnOffsets: [2, 0, 1] }))).toEqual([
      { name: "B", offset: 0 },
      { name: "C", offset: 1 },
      { name: "A", offset: 2 },
    ]);
  });

  it("keeps configuration order for equal offsets", () => {
    expect(
      planSpawns(config({ spawnOffsets: [1, 0, 1] })).map((slot) => slot.name),
    ).toEqual(["B", "A", "C"]);
  });

  it("draws reproducible random offsets below the maximum", () => {
    const first = planSpawns(config({ seed: 42 }));
    const second = planSpawns(config({ seed: 42 }));

    expect(first).toEqual(second);
    expect(first.map((slot) => slot.name).sort()).toEqual(["A", "B", "C"]);
    for (const slot of first) {
      expect(slot.offset).toBeGreaterThanOrEqual(0);
      expect(slot.offset).toBeLessThan(5);
    }
    for (let i = 1; i < first.length; i++) {
      expect(first[i]?.offset).toBeGreaterThanOrEqual(first[i - 1]?.offset ?? 0);
    }
  });

  it("starts everyone at once when the maximum is zero", () => {
    expect(planSpawns(config({ spawnMaxSeconds: 0 }))).toEqual([
      { name: "A", offset: 0 },
      { name: "B", offset: 0 },
      { name: "C", offset: 0 },
    ]);
  });
});

describe("mulberry32", () => {
  it("is deterministic and stays in [0, 1)", () => {
    const a = mulberry32(7);
    const b = mulberry32(7);
    const c = mulberry32(8);

    const fromA = Array.from({ length: 20 }, () => a());
    const fromB = Array.from({ length: 20 }, () => b());
    const fromC = Array.from({ length: 20 }, () => c());

    expect(fromA).toEqual(fromB);
    expect(fromA).not.toEqual(fromC);
    for (const value of fromA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
