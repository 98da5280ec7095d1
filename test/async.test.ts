import { describe, expect, it } from "vitest";
import { asyncPool, createDeadline, delay, fanOut, sleepWithSignal } from "../src/utils/async";

describe("asyncPool", () => {
  it("keeps results in item order and bounds concurrency", async () => {
    let active = 0;
    let peak = 0;
    const results = await asyncPool(2, [30, 10, 20, 5], async (ms) => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(ms);
      active -= 1;
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40, 10]);
    expect(peak).toBe(2);
  });

  it("starts nothing once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = 0;
    const results = await asyncPool(
      4,
      [1, 2, 3],
      async (n) => {
        started += 1;
        return n;
      },
      controller.signal,
    );
    expect(started).toBe(0);
    expect(results).toEqual([undefined, undefined, undefined]);
  });
});

describe("fanOut", () => {
  it("settles every slot", async () => {
    const slots = await fanOut([1, 2, 3], async (n) => {
      if (n === 2) throw new Error("two");
      return n * 10;
    });

    expect(slots[0]).toEqual({ ok: true, value: 10 });
    expect(slots[1]).toMatchObject({ ok: false });
    expect(slots[2]).toEqual({ ok: true, value: 30 });
  });

  it("leaves unsettled slots empty at the deadline", async () => {
    const slots = await fanOut(
      ["fast", "stuck"],
      (name) => (name === "fast" ? Promise.resolve(name) : new Promise<string>(() => undefined)),
      { timeoutMs: 20 },
    );
    expect(slots).toEqual([{ ok: true, value: "fast" }, undefined]);
  });

  it("hands workers a signal that aborts at the deadline", async () => {
    let seen: AbortSignal | undefined;
    await fanOut(
      ["a"],
      (_item, signal) => {
        seen = signal;
        return new Promise<void>(() => undefined);
      },
      { timeoutMs: 10 },
    );
    expect(seen?.aborted).toBe(true);
  });

  it("returns an empty array for no items", async () => {
    await expect(fanOut([], async () => 1)).resolves.toEqual([]);
  });
});

describe("createDeadline", () => {
  it("follows the parent signal", () => {
    const parent = new AbortController();
    const deadline = createDeadline(parent.signal);
    expect(deadline.signal.aborted).toBe(false);
    parent.abort();
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it("aborts after the timeout", async () => {
    const deadline = createDeadline(undefined, 5);
    await sleepWithSignal(50, deadline.signal);
    expect(deadline.signal.aborted).toBe(true);
    expect(String(deadline.signal.reason)).toContain("Deadline of 5ms exceeded");
  });
});

describe("delay and sleepWithSignal", () => {
  it("delay rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = delay(1_000, controller.signal);
    controller.abort(new Error("cancelled"));
    await expect(pending).rejects.toThrow("cancelled");
  });

  it("sleepWithSignal returns early on abort", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleepWithSignal(1_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(500);
  });
});
