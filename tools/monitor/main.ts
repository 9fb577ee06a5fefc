#!/usr/bin/env -S npx tsx
/**
 * meshsim monitor - live text view of a run's event log.
 *
 * Tails sim_output.log and shows, for each node, who can reach it and its
 * last packet events (`--mode events`), or its last reported neighbour
 * table (`--mode state`).
 *
 * Usage:
 *   meshsim-monitor --log out/sim_output.log --nodes ND01 ND02 ND03
 *
 * Escape, Ctrl-C, SIGINT and SIGTERM quit.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { delay } from "../../core/src/clock.ts";
import { DEFAULT_NODES } from "../../core/src/config.ts";
import { errorMessage } from "../../core/src/errors.ts";
import { withShutdown } from "../../core/src/helpers.ts";
import { createLogger } from "../../core/src/logger.ts";
import { CLEAR_SCREEN, renderView } from "./render.ts";
import { MonitorState } from "./state.ts";
import { LogTail } from "./tail.ts";
import type { MonitorMode } from "./types.ts";

const MODES: readonly MonitorMode[] = ["events", "state"];
const DEFAULT_MODE: MonitorMode = "events";

const logger = createLogger("monitor");

async function main(): Promise<void> {
  const args = yargs(hideBin(process.argv))
    .scriptName("meshsim-monitor")
    .option("log", {
      type: "string",
      default: "sim_output.log",
      describe: "Event log to follow",
    })
    .option("nodes", {
      alias: "n",
      type: "string",
      array: true,
      default: [...DEFAULT_NODES],
      describe: "Node names, in the orchestrator's order",
    })
    .option("mode", {
      choices: MODES,
      default: DEFAULT_MODE,
      describe: "Panel contents",
    })
    .option("interval", {
      type: "number",
      default: 250,
      describe: "Poll interval in milliseconds",
    })
    .option("from-start", {
      type: "boolean",
      default: false,
      describe: "Replay records already in the log",
    })
    .strict()
    .parseSync();

  const mode = MODES.find((m) => m === args.mode) ?? DEFAULT_MODE;
  const state = new MonitorState(args.nodes);
  const tail = new LogTail(args.log, args["from-start"]);
  logger.info(`Following ${args.log}`);

  await withShutdown(async (shutdown) => {
    let dirty = true;
    while (!shutdown.aborted) {
      for (const line of await tail.poll()) {
        if (state.handleLine(line)) dirty = true;
      }
      if (dirty) {
        process.stdout.write(`${CLEAR_SCREEN}${renderView(state, mode)}\n`);
        dirty = false;
      }
      await delay(args.interval, shutdown);
    }
  });
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error(errorMessage(err));
    process.exit(1);
  },
);
