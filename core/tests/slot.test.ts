import { describe, expect, it } from "vitest";

import { ResponseSlot } from "../src/slot.ts";

describe("ResponseSlot", () => {
  it("hands over a value offered before take", async () => {
    const slot = new ResponseSlot();
    slot.offer("get_state,1");

    expect(slot.pending).toBe(true);
    expect(await slot.take(100)).toBe("get_state,1");
    expect(slot.pending).toBe(false);
  });

  it("keeps only the most recent unconsumed value", async () => {
    const slot = new ResponseSlot();
    slot.offer("first");
    slot.offer("second");

    expect(await slot.take(100)).toBe("second");
    expect(await slot.take(0)).toBeNull();
  });

  it("wakes a waiting reader", async () => {
    const slot = new ResponseSlot();
    const taken = slot.take(1000);
    slot.offer("late");

    expect(await taken).toBe("late");
    expect(slot.pending).toBe(false);
  });

  it("times out with null", async () => {
    const slot = new ResponseSlot();
    const started = performance.now();

    expect(await slot.take(30)).toBeNull();
    expect(performance.now() - started).toBeLessThan(1000);
  });

  it("drops the value on clear", async () => {
    const slot = new ResponseSlot();
    slot.offer("stale");
    slot.clear();

    expect(slot.pending).toBe(false);
    expect(await slot.take(0)).toBeNull();
  });

  it("releases a waiting reader on close and ignores later offers", async () => {
    const slot = new ResponseSlot();
    const taken = slot.take(5000);
    slot.close();

    expect(await taken).toBeNull();
    slot.offer("after");
    expect(slot.pending).toBe(false);
    expect(await slot.take(100)).toBeNull();
  });

  it("delivers a value offered after a timed-out take to the next take", async () => {
    const slot = new ResponseSlot();
    expect(await slot.take(10)).toBeNull();

    slot.offer("next");
    expect(await slot.take(100)).toBe("next");
  });
});
