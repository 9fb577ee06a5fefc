/**
 * Incremental reader of a growing log file.
 * @module
 */

import { open, stat } from "node:fs/promises";
import { StringDecoder } from "node:string_decoder";

/**
 * Follows a file by offset, returning only complete lines.
 *
 * A file that shrinks (a new run truncated it) is read again from the
 * start. A file that does not exist yet reads as empty.
 */
export class LogTail {
  readonly path: string;
  #offset: number;
  #partial = "";
  // Holds a multibyte character split across two polls.
  #decoder = new StringDecoder("utf8");
  #fromEnd: boolean;

  /**
   * @param fromStart - Read existing content too, instead of only new lines
   */
  constructor(path: string, fromStart = false) {
    this.path = path;
    this.#offset = 0;
    this.#fromEnd = !fromStart;
  }

  /**
   * Read whatever was appended since the last poll.
   */
  async poll(): Promise<string[]> {
    let size: number;
    try {
      size = (await stat(this.path)).size;
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    if (this.#fromEnd) {
      this.#fromEnd = false;
      this.#offset = size;
      return [];
    }

    if (size < this.#offset) {
      this.#offset = 0;
      this.#partial = "";
      this.#decoder = new StringDecoder("utf8");
    }
    if (size === this.#offset) return [];

    const handle = await open(this.path, "r");
    try {
      const buffer = Buffer.alloc(size - this.#offset);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.#offset);
      this.#offset += bytesRead;

      const chunk = this.#decoder.write(buffer.subarray(0, bytesRead));
      const text = this.#partial + chunk;
      const lines = text.split("\n");
      this.#partial = lines.pop() ?? "";
      return lines.map((line) => line.replace(/\r$/, ""));
    } finally {
      await handle.close();
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
