import { describe, expect, it } from "vitest";

import { formatSummary, summaryEntry } from "../src/summary.ts";

describe("summaryEntry", () => {
  it("parses state responses", () => {
    expect(summaryEntry("ND01", "get_state,10")).toEqual({
      node: "ND01",
      configured: true,
      response: "get_state,10",
      state: { uptimeMs: "10", entries: [] },
    });
  });

  it("keeps a missing response as null", () => {
    expect(summaryEntry("ND01", null)).toEqual({
      node: "ND01",
      configured: true,
      response: null,
      state: null,
    });
  });
});

describe("formatSummary", () => {
  it("prints one block per node", () => {
    const text = formatSummary({
      runId: "run_test",
      stoppedBy: "duration",
      entries: [
        summaryEntry(
          "ND01",
          "get_state,1500,ND02,12,45.5,-73.6,ND03,14,45.6,-73.7",
        ),
        summaryEntry("ND02", null),
        summaryEntry("ND03", "garbled"),
        summaryEntry("ND09", null, false),
      ],
    });

    expect(text.split("\n")).toEqual([
      "Final node states (run_test, stopped by duration):",
      "",
      "ND01:",
      "    uptime 1500 ms",
      "    Node  Timestamp        Lat        Lon",
      "    ND02         12       45.5      -73.6",
      "    ND03         14       45.6      -73.7",
      "",
      "ND02:",
      "  <no response>",
      "",
      "ND03:",
      "  garbled",
      "",
      "ND09:",
      "  <no response> (not configured)",
    ]);
  });

  it("prints just the header for an empty run", () => {
    expect(
      formatSummary({ runId: "run_empty", stoppedBy: "cancelled", entries: [] }),
    ).toBe("Final node states (run_empty, stopped by cancelled):");
  });
});
