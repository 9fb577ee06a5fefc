/**
 * In-process stand-ins for node programs.
 * @module
 */

import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";

import type { NodeProcess, ProcessLauncher } from "../src/supervisor.ts";
import type { RoutableNode } from "../src/types.ts";

/** Reacts to one command line written to a fake node. */
export type Responder = (command: string, node: FakeProcess) => void;

/**
 * A node process over in-memory pipes.
 *
 * Commands written to stdin are recorded and handed to the responder, which
 * can answer with {@link emit}.
 */
export class FakeProcess implements NodeProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: string[] = [];
  killed = false;

  constructor(responder?: Responder) {
    createInterface({ input: this.stdin }).on("line", (line) => {
      this.received.push(line);
      responder?.(line, this);
    });
  }

  /** Write one line to stdout. */
  emit(line: string): void {
    if (!this.stdout.writableEnded) this.stdout.write(`${line}\n`);
  }

  /** Write one line to stderr. */
  emitError(line: string): void {
    if (!this.stderr.writableEnded) this.stderr.write(`${line}\n`);
  }

  kill(): void {
    this.killed = true;
    this.stdout.end();
    this.stderr.end();
  }
}

/**
 * Launcher handing out fake processes in spawn order.
 */
export function fakeLauncher(responder?: Responder): {
  launcher: ProcessLauncher;
  processes: FakeProcess[];
} {
  const processes: FakeProcess[] = [];
  const launcher: ProcessLauncher = () => {
    const child = new FakeProcess(responder);
    processes.push(child);
    return Promise.resolve(child);
  };
  return { launcher, processes };
}

/** Answers every `get_state` with `get_state,<uptime>`. */
export function stateResponder(uptime = "100"): Responder {
  return (command, node) => {
    if (command === "get_state") node.emit(`get_state,${uptime}`);
  };
}

/**
 * Routable node recording what it is sent.
 */
export class RecordingNode implements RoutableNode {
  readonly name: string;
  readonly sent: string[] = [];
  queries = 0;
  stateResponse: string | null = null;
  failQueries: Error | null = null;
  /** When false, commands are dropped as by a terminated node. */
  accepting = true;

  constructor(name: string) {
    this.name = name;
  }

  send(commandLine: string): boolean {
    if (!this.accepting) return false;
    this.sent.push(commandLine);
    return true;
  }

  queryState(): Promise<string | null> {
    this.queries++;
    if (this.failQueries) return Promise.reject(this.failQueries);
    return Promise.resolve(this.stateResponse);
  }
}
