/**
 * Command-line options of the orchestrator.
 * @module
 */

import yargs from "yargs";

import {
  DEFAULT_NODES,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_SPAWN_MAX_SECONDS,
  type SimulationConfig,
} from "../../core/src/config.ts";
import { ValidationError } from "../../core/src/errors.ts";
import { DEFAULT_PROBE_TIMEOUT_MS } from "../../core/src/router.ts";

/** Environment variable naming the node program. */
export const NODE_EXE_ENV = "MESHSIM_NODE_EXE";

/** Node program used when neither `--node-exe` nor the environment name one. */
export const DEFAULT_NODE_EXE = "./network_simulator";

/** File name of the run-wide event log inside the output directory. */
export const EVENT_LOG_FILE = "sim_output.log";

export interface CliOptions {
  /** Timeline file */
  input: string;
  /** Directory receiving the event log and per-node logs */
  outdir: string;
  /** Keep the event log off the console */
  quiet: boolean;
  config: SimulationConfig;
}

/**
 * Parse orchestrator arguments (without the leading `node script` pair).
 *
 * @throws {ValidationError} On unknown or malformed arguments
 */
export function parseArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const args = yargs([...argv])
    .scriptName("meshsim")
    .usage("$0 --input <timeline> [options]")
    .option("input", {
      alias: "i",
      type: "string",
      demandOption: true,
      describe: "Timeline file: <timestamp>,<destination|-1>,<payload> per line",
    })
    .option("nodes", {
      alias: "n",
      type: "string",
      array: true,
      default: [...DEFAULT_NODES],
      describe: "Node names, in connectivity-matrix order",
    })
    .option("node-exe", {
      type: "string",
      default: env[NODE_EXE_ENV] ?? DEFAULT_NODE_EXE,
      describe: `Node program (falls back to $${NODE_EXE_ENV})`,
    })
    .option("outdir", {
      alias: "o",
      type: "string",
      default: ".",
      describe: `Directory for ${EVENT_LOG_FILE} and per-node logs`,
    })
    .option("duration", {
      alias: "d",
      type: "number",
      describe: "Stop after this many seconds of running",
    })
    .option("spawn-offsets", {
      type: "number",
      array: true,
      describe: "Per-node spawn offsets in seconds, one per node",
    })
    .option("spawn-max", {
      type: "number",
      default: DEFAULT_SPAWN_MAX_SECONDS,
      describe: "Upper bound of random spawn offsets in seconds",
    })
    .option("seed", {
      type: "number",
      default: 0,
      describe: "Seed for random spawn offsets",
    })
    .option("query-timeout", {
      type: "number",
      default: DEFAULT_QUERY_TIMEOUT_MS,
      describe: "Final state query deadline in milliseconds",
    })
    .option("probe-timeout", {
      type: "number",
      default: DEFAULT_PROBE_TIMEOUT_MS,
      describe: "Post-forward state probe deadline in milliseconds (0 disables)",
    })
    .option("exit-on-complete", {
      type: "boolean",
      default: false,
      describe: "Stop once every timeline event has been applied",
    })
    .option("quiet", {
      alias: "q",
      type: "boolean",
      default: false,
      describe: "Write the event log only to the file",
    })
    .strict()
    .exitProcess(false)
    .fail((message, err) => {
      throw new ValidationError(err?.message ?? message, "argv");
    })
    .parseSync();

  return {
    input: args.input,
    outdir: args.outdir,
    quiet: args.quiet,
    config: {
      nodes: args.nodes,
      nodeExecutable: args["node-exe"],
      durationSeconds: args.duration ?? null,
      spawnOffsets: args["spawn-offsets"] ?? null,
      spawnMaxSeconds: args["spawn-max"],
      seed: args.seed,
      stopWhenTimelineEnds: args["exit-on-complete"],
      queryTimeoutMs: args["query-timeout"],
      probeTimeoutMs: args["probe-timeout"],
    },
  };
}
