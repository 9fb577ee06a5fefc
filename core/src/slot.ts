/**
 * Single-slot mailbox for query responses.
 * @module
 */

/**
 * Holds at most one unconsumed response line.
 *
 * Contract: "most recent wins". An offered line either goes straight to the
 * waiting reader or replaces whatever the slot held; older unconsumed lines
 * are lost. There is at most one waiting reader at a time; callers serialize
 * their `take` calls.
 *
 * @example
 * ```typescript
 * const slot = new ResponseSlot();
 * slot.offer("node_update,ND01,1");
 * slot.offer("get_state,120");
 * await slot.take(100); // "get_state,120"
 * await slot.take(100); // null after 100 ms
 * ```
 */
export class ResponseSlot {
  #value: string | null = null;
  #waitingResolve: ((value: string | null) => void) | null = null;
  #closed = false;

  /**
   * Put a line in the slot, overwriting any unconsumed value.
   */
  offer(line: string): void {
    if (this.#closed) return;

    if (this.#waitingResolve) {
      this.#waitingResolve(line);
      this.#waitingResolve = null;
    } else {
      this.#value = line;
    }
  }

  /**
   * Drop the unconsumed value, if any.
   */
  clear(): void {
    this.#value = null;
  }

  /**
   * Wait up to `timeoutMs` for a line.
   *
   * @returns The line, or `null` if the deadline passed or the slot closed.
   */
  take(timeoutMs: number): Promise<string | null> {
    if (this.#value !== null) {
      const value = this.#value;
      this.#value = null;
      return Promise.resolve(value);
    }

    if (this.#closed || timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (this.#waitingResolve === settle) {
          this.#waitingResolve = null;
        }
        resolve(null);
      }, timeoutMs);

      const settle = (value: string | null) => {
        clearTimeout(timer);
        resolve(value);
      };
      this.#waitingResolve = settle;
    });
  }

  /**
   * Whether a value is waiting to be taken.
   */
  get pending(): boolean {
    return this.#value !== null;
  }

  /**
   * Close the slot. A waiting `take` resolves with `null`.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#value = null;

    if (this.#waitingResolve) {
      this.#waitingResolve(null);
      this.#waitingResolve = null;
    }
  }
}
