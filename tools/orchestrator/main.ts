#!/usr/bin/env -S npx tsx
/**
 * meshsim orchestrator - runs one process per node and replays a timeline.
 *
 * Usage:
 *   meshsim --input timeline.csv --nodes ND01 ND02 --node-exe ./network_simulator
 *
 * Escape (on a terminal), Ctrl-C, SIGINT and SIGTERM stop the run; the final
 * node states are printed either way.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { hideBin } from "yargs/helpers";

import { WallClock } from "../../core/src/clock.ts";
import { validateConfig } from "../../core/src/config.ts";
import { errorMessage, SpawnError, ValidationError } from "../../core/src/errors.ts";
import { withShutdown } from "../../core/src/helpers.ts";
import { SimulationController } from "../../core/src/lifecycle.ts";
import { createLogger } from "../../core/src/logger.ts";
import { EventLog } from "../../core/src/records.ts";
import { fileSink, StreamSink } from "../../core/src/sinks.ts";
import { formatSummary } from "../../core/src/summary.ts";
import { loadTimeline } from "../../core/src/timeline.ts";
import type { LineSink } from "../../core/src/types.ts";
import { type CliOptions, EVENT_LOG_FILE, parseArgs } from "./cli.ts";

const logger = createLogger("meshsim");

function readOptions(): CliOptions | null {
  try {
    const options = parseArgs(hideBin(process.argv));
    validateConfig(options.config);
    return options;
  } catch (err) {
    if (err instanceof ValidationError) {
      logger.error(err.message);
      return null;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const options = readOptions();
  if (!options) return 1;
  const { config, input, outdir, quiet } = options;

  const timeline = await loadTimeline(input).catch((err: unknown) => {
    logger.error(`Cannot read timeline ${input}: ${errorMessage(err)}`);
    return null;
  });
  if (!timeline) return 1;
  for (const issue of timeline.issues) {
    logger.warn(issue.message);
  }

  await mkdir(outdir, { recursive: true });

  const clock = new WallClock();
  const sinks: LineSink[] = [fileSink(join(outdir, EVENT_LOG_FILE))];
  if (!quiet) {
    sinks.push(new StreamSink(process.stdout));
  }
  const eventLog = new EventLog(clock, sinks);

  const controller = new SimulationController(config, {
    clock,
    eventLog,
    logger,
    openNodeLogs: (node) => ({
      stdout: fileSink(join(outdir, `${node}.stdout.log`)),
      stderr: fileSink(join(outdir, `${node}.stderr.log`)),
    }),
  });

  logger.info(
    `Run ${controller.runId}: ${config.nodes.length} node(s), ${timeline.events.length} event(s)`,
  );

  try {
    const summary = await withShutdown((shutdown) =>
      controller.run(timeline.events, shutdown)
    );
    console.log(formatSummary(summary));
    return 0;
  } catch (err) {
    if (err instanceof SpawnError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  } finally {
    await eventLog.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    logger.error(`Fatal: ${errorMessage(err)}`);
    process.exit(1);
  },
);
