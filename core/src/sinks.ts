/**
 * Line sinks for the event log and per-node output logs.
 * @module
 */

import { createWriteStream } from "node:fs";
import type { Writable } from "node:stream";

import type { LineSink } from "./types.ts";

/**
 * Sink over a writable stream. Each line is written with one `write` call.
 *
 * When `owned` is set, `close()` ends the stream and waits for it to flush;
 * otherwise the stream (e.g. `process.stdout`) is left open.
 */
export class StreamSink implements LineSink {
  readonly #stream: Writable;
  readonly #owned: boolean;

  constructor(stream: Writable, owned = false) {
    this.#stream = stream;
    this.#owned = owned;
  }

  writeLine(line: string): void {
    if (this.#stream.writableEnded) return;
    this.#stream.write(`${line}\n`);
  }

  close(): Promise<void> {
    if (!this.#owned || this.#stream.writableEnded) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.#stream.end(() => resolve());
    });
  }
}

/**
 * Open a file for writing (truncating it) and wrap it as a sink.
 */
export function fileSink(path: string): StreamSink {
  const stream = createWriteStream(path, { flags: "w" });
  stream.on("error", (err) => {
    console.error(`[sink] ${path}: ${err.message}`);
  });
  return new StreamSink(stream, true);
}

/**
 * Sink that keeps lines in memory.
 */
export class MemorySink implements LineSink {
  readonly lines: string[] = [];
  closed = false;

  writeLine(line: string): void {
    this.lines.push(line);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}
