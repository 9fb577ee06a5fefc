/**
 * Shutdown plumbing for command-line runs.
 *
 * @example
 * ```typescript
 * const summary = await withShutdown((shutdown) =>
 *   controller.run(timeline.events, shutdown)
 * );
 * ```
 *
 * @module
 */

import { emitKeypressEvents } from "node:readline";

/** Callback receiving the shared stop signal. */
export type RunFn<T> = (shutdown: AbortSignal) => Promise<T>;

export interface ShutdownOptions {
  /**
   * Also stop on Escape (and Ctrl-C, which raw mode no longer turns into
   * SIGINT) when stdin is a terminal. Default: true.
   */
  keyboard?: boolean;
  /** Terminal input to listen on (default: `process.stdin`) */
  input?: NodeJS.ReadStream;
}

interface Key {
  name?: string;
  ctrl?: boolean;
}

/**
 * Listen for the interactive stop key on a terminal.
 *
 * @returns A function restoring the terminal; a no-op when `input` is not a TTY.
 */
export function listenForStopKey(
  input: NodeJS.ReadStream,
  onStop: () => void,
): () => void {
  if (!input.isTTY) {
    return () => {};
  }

  emitKeypressEvents(input);
  input.setRawMode(true);
  input.resume();

  const onKeypress = (_text: string | undefined, key: Key | undefined) => {
    if (key?.name === "escape" || (key?.ctrl === true && key.name === "c")) {
      onStop();
    }
  };
  input.on("keypress", onKeypress);

  return () => {
    input.off("keypress", onKeypress);
    input.setRawMode(false);
    input.pause();
  };
}

/**
 * Run `fn` with a stop signal that fires on SIGINT, SIGTERM or the stop key.
 *
 * Signal handlers and terminal mode are restored when `fn` settles.
 */
export async function withShutdown<T>(
  fn: RunFn<T>,
  options: ShutdownOptions = {},
): Promise<T> {
  const abortController = new AbortController();
  const signalHandler = () => {
    abortController.abort();
  };

  process.on("SIGTERM", signalHandler);
  process.on("SIGINT", signalHandler);
  const restoreTerminal = options.keyboard === false
    ? () => {}
    : listenForStopKey(options.input ?? process.stdin, signalHandler);

  try {
    return await fn(abortController.signal);
  } finally {
    process.off("SIGTERM", signalHandler);
    process.off("SIGINT", signalHandler);
    restoreTerminal();
  }
}
