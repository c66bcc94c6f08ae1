/**
 * Worker Pool Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { runPool, successfulValues } from "../../src/utils/worker-pool";
import { TraceError } from "../../src/api/chain/types";
import { createLogger } from "../../src/utils/logger";

const silent = createLogger({ level: "fatal", prettyPrint: false });

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("runPool", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should key outcomes by item regardless of completion order", async () => {
    const slow = deferred<string>();
    const outcomes = runPool(
      ["a", "b"],
      (item) => (item === "a" ? slow.promise : Promise.resolve("B")),
      { concurrency: 2, delayMs: 0, logger: silent }
    );
    slow.resolve("A");

    const result = await outcomes;
    expect(result.get("a")).toEqual({ ok: true, value: "A" });
    expect(result.get("b")).toEqual({ ok: true, value: "B" });
  });

  it("should never exceed the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;

    await runPool(
      [1, 2, 3, 4, 5, 6, 7],
      async (n) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 1));
        inFlight--;
        return n;
      },
      { concurrency: 3, delayMs: 0, logger: silent }
    );

    expect(peak).toBe(3);
  });

  it("should record a failure without affecting other units", async () => {
    const result = await runPool(
      ["ok", "bad"],
      async (item) => {
        if (item === "bad") throw new Error("rate limited");
        return item.length;
      },
      { concurrency: 1, delayMs: 0, logger: silent }
    );

    expect(result.get("ok")).toEqual({ ok: true, value: 2 });
    const failed = result.get("bad");
    expect(failed?.ok).toBe(false);
    if (failed && !failed.ok) {
      expect(failed.error.message).toBe("rate limited");
    }
    expect(successfulValues(result)).toEqual(new Map([["ok", 2]]));
  });

  it("should wrap non-Error rejections", async () => {
    const result = await runPool(["x"], () => Promise.reject("boom"), { delayMs: 0, logger: silent });
    const outcome = result.get("x");
    expect(outcome?.ok).toBe(false);
    if (outcome && !outcome.ok) {
      expect(outcome.error).toBeInstanceOf(Error);
      expect(outcome.error.message).toBe("boom");
    }
  });

  it("should process duplicate items once", async () => {
    const worker = vi.fn(async (item: string) => item);
    await runPool(["a", "a", "b"], worker, { delayMs: 0, logger: silent });
    expect(worker).toHaveBeenCalledTimes(2);
  });

  it("should pause after each unit", async () => {
    vi.useFakeTimers();
    const worker = vi.fn(async (item: string) => item);

    const done = runPool(["a", "b"], worker, { concurrency: 1, delayMs: 100, logger: silent });
    await vi.advanceTimersByTimeAsync(0);
    expect(worker).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(worker).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(100);
    const result = await done;
    expect(result.size).toBe(2);
  });

  it("should reject with TRACE_ABORTED when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const worker = vi.fn(async (item: string) => item);

    await expect(runPool(["a"], worker, { signal: controller.signal, logger: silent })).rejects.toMatchObject({
      code: "TRACE_ABORTED",
    });
    expect(worker).not.toHaveBeenCalled();
  });

  it("should stop dispatching once aborted mid-run", async () => {
    const controller = new AbortController();
    const seen: string[] = [];

    const run = runPool(
      ["a", "b", "c"],
      async (item) => {
        seen.push(item);
        controller.abort();
        return item;
      },
      { concurrency: 1, delayMs: 0, signal: controller.signal, logger: silent }
    );

    await expect(run).rejects.toBeInstanceOf(TraceError);
    expect(seen).toEqual(["a"]);
  });

  it("should return an empty map for no items", async () => {
    const result = await runPool([], async () => 1, { logger: silent });
    expect(result.size).toBe(0);
  });
});
