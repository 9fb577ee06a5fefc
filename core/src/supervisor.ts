/**
 * Node Supervisor: owns one node process and its stdin/stdout/stderr.
 * @module
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import { DisposedError, errorMessage, SpawnError } from "./errors.ts";
import { silentLogger } from "./logger.ts";
import { CMD_GET_STATE, classifyLine, isStateResponse } from "./protocol.ts";
import type { EventLog } from "./records.ts";
import { formatElapsed } from "./records.ts";
import { ResponseSlot } from "./slot.ts";
import type {
  LineSink,
  Logger,
  PacketDispatcher,
  RoutableNode,
  SimClock,
} from "./types.ts";

// ============================================================================
// Process Launching
// ============================================================================

/**
 * The parts of a child process the supervisor talks to.
 */
export interface NodeProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(): void;
}

/**
 * Start a node program. Rejects if it cannot be started; errors the process
 * raises after that go to `logger`.
 */
export type ProcessLauncher = (
  executable: string,
  logger: Logger,
) => Promise<NodeProcess>;

/**
 * Launch `executable` with piped stdio. Resolves once the OS reports the
 * process started, rejects on the spawn `error` event (e.g. ENOENT).
 */
export const launchProcess: ProcessLauncher = (executable, logger) =>
  new Promise((resolve, reject) => {
    const child = spawn(executable, [], { stdio: "pipe" });

    const onStartError = (err: Error) => reject(err);
    child.once("error", onStartError);
    child.once("spawn", () => {
      child.off("error", onStartError);
      child.on("error", (err) => {
        logger.error(`Process ${executable} failed: ${err.message}`);
      });
      resolve({
        stdin: child.stdin,
        stdout: child.stdout,
        stderr: child.stderr,
        kill: () => {
          child.kill();
        },
      });
    });
  });

// ============================================================================
// Supervisor
// ============================================================================

/**
 * Options for {@link NodeSupervisor.spawn}.
 */
export interface SupervisorOptions {
  /** Program to start */
  executable: string;
  /** Receives packets this node transmits */
  dispatcher: PacketDispatcher;
  /** Run-wide event log (`tx` records) */
  eventLog: EventLog;
  /** Simulation clock used to stamp output lines */
  clock: SimClock;
  /** Per-node stdout log; every line, stamped */
  stdoutLog?: LineSink;
  /** Per-node stderr log; every line, stamped */
  stderrLog?: LineSink;
  /** Diagnostics */
  logger?: Logger;
  /** Process launcher (default: {@link launchProcess}) */
  launcher?: ProcessLauncher;
}

/**
 * Supervises one node process.
 *
 * Two readers run for the process lifetime:
 * - stdout: every line is logged; `transmit_packet` lines become `tx`
 *   records handed to the dispatcher, all others go to the response slot
 * - stderr: every line is logged, nothing else
 *
 * Queries are serialized per node: a query waits for the previous one to
 * finish before clearing the slot and sending `get_state`.
 */
export class NodeSupervisor implements RoutableNode {
  readonly name: string;

  readonly #process: NodeProcess;
  readonly #options: SupervisorOptions;
  readonly #logger: Logger;
  readonly #slot = new ResponseSlot();
  #queryTail: Promise<unknown> = Promise.resolve();
  #terminated = false;
  #stdinBroken = false;

  private constructor(
    name: string,
    child: NodeProcess,
    options: SupervisorOptions,
  ) {
    this.name = name;
    this.#process = child;
    this.#options = options;
    this.#logger = options.logger ?? silentLogger;
  }

  /**
   * Start the node program and its readers.
   *
   * @throws {SpawnError} If the program cannot be started
   */
  static async spawn(
    name: string,
    options: SupervisorOptions,
  ): Promise<NodeSupervisor> {
    const launcher = options.launcher ?? launchProcess;
    const logger = options.logger ?? silentLogger;

    let child: NodeProcess;
    try {
      child = await launcher(options.executable, logger);
    } catch (err) {
      throw new SpawnError(name, options.executable, errorMessage(err));
    }

    const supervisor = new NodeSupervisor(name, child, options);
    supervisor.#startReaders();
    return supervisor;
  }

  /**
   * Whether {@link terminate} has been called.
   */
  get terminated(): boolean {
    return this.#terminated;
  }

  /**
   * Write one command line to the node. Fire-and-forget.
   *
   * @returns `false` if the node is gone and the line was dropped
   */
  send(commandLine: string): boolean {
    if (this.#terminated || this.#stdinBroken) {
      this.#logger.warn(`Dropping command for '${this.name}': ${commandLine}`);
      return false;
    }
    // One write per line keeps lines whole on the pipe.
    this.#process.stdin.write(`${commandLine}\n`);
    return true;
  }

  /**
   * Ask the node for its state.
   *
   * Clears any unconsumed response, sends `get_state`, then waits for a line
   * starting with `get_state`. The deadline runs from this call, including
   * time spent behind an earlier query on the same node.
   *
   * @returns The raw response line, or `null` if none arrived in time.
   * @throws {DisposedError} If the supervisor was terminated
   */
  queryState(timeoutMs: number): Promise<string | null> {
    if (this.#terminated) {
      return Promise.reject(new DisposedError(`Node '${this.name}'`));
    }

    const deadline = performance.now() + timeoutMs;
    const query = this.#queryTail.then(() => this.#runQuery(deadline));
    this.#queryTail = query.catch(() => undefined);
    return query;
  }

  /**
   * Terminate the node process. Best effort: the process may already be gone.
   */
  terminate(): void {
    if (this.#terminated) return;
    this.#terminated = true;
    this.#slot.close();

    try {
      this.#process.kill();
    } catch {
      // Already exited
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  async #runQuery(deadline: number): Promise<string | null> {
    if (this.#terminated || performance.now() >= deadline) {
      return null;
    }

    this.#slot.clear();
    this.send(CMD_GET_STATE);

    while (true) {
      const remaining = deadline - performance.now();
      if (remaining <= 0) return null;

      const line = await this.#slot.take(remaining);
      if (line === null) return null;
      if (isStateResponse(line)) return line;
    }
  }

  #stamp(line: string): string {
    return `${formatElapsed(this.#options.clock.elapsed())},${line}`;
  }

  #startReaders(): void {
    this.#process.stdin.on("error", (err) => {
      if (!this.#stdinBroken) {
        this.#stdinBroken = true;
        if (!this.#terminated) {
          this.#logger.warn(`stdin of '${this.name}' closed: ${err.message}`);
        }
      }
    });

    const stdout = createInterface({
      input: this.#process.stdout,
      crlfDelay: Infinity,
    });
    stdout.on("line", (line) => {
      try {
        this.#handleStdoutLine(line);
      } catch (err) {
        this.#logger.error(
          `Failed to handle output of '${this.name}': ${errorMessage(err)}`,
        );
      }
    });
    stdout.on("close", () => {
      // No more responses can arrive; pending and later queries come back empty.
      this.#slot.close();
      if (!this.#terminated) {
        this.#logger.info(`Output of '${this.name}' closed`);
      }
    });

    const stderr = createInterface({
      input: this.#process.stderr,
      crlfDelay: Infinity,
    });
    stderr.on("line", (line) => {
      this.#options.stderrLog?.writeLine(this.#stamp(line));
    });
  }

  #handleStdoutLine(line: string): void {
    this.#options.stdoutLog?.writeLine(this.#stamp(line));

    const output = classifyLine(line);
    switch (output.kind) {
      case "push": {
        const { hexData } = output.packet;
        this.#options.eventLog.append({
          kind: "tx",
          source: this.name,
          hexData,
        });
        this.#options.dispatcher.deliver(this.name, hexData);
        break;
      }

      case "malformed":
        this.#logger.warn(
          `Malformed push from '${this.name}' (${output.reason}): ${output.line}`,
        );
        break;

      case "response":
        this.#slot.offer(output.line);
        break;
    }
  }
}
