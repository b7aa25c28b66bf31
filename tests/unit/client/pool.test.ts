import { describe, it, expect } from "vitest";

import { runPool } from "../../../src/client/pool.js";
import { CancelledError } from "../../../src/errors.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("client/pool", () => {
  it("should return results in input order", async () => {
    const results = await runPool([30, 10, 20], 2, async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it("should never run more workers than the limit", async () => {
    let active = 0;
    let peak = 0;

    await runPool([1, 2, 3, 4, 5, 6], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return n;
    });

    expect(peak).toBe(2);
  });

  it("should resolve an empty list", async () => {
    expect(await runPool([], 4, () => Promise.resolve(1))).toEqual([]);
  });

  it("should reject with the first failure and stop taking work", async () => {
    const started: number[] = [];

    const result = runPool([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      await tick();
      if (n === 2) {
        throw new Error("boom");
      }
      return n;
    });

    await expect(result).rejects.toThrow("boom");
    expect(started).toEqual([1, 2]);
  });

  it("should signal running workers when it fails", async () => {
    let sawAbort = false;

    const result = runPool([1, 2], 2, async (n, signal) => {
      if (n === 1) {
        await tick();
        throw new Error("boom");
      }
      await new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => {
          sawAbort = true;
          resolve();
        });
      });
      return n;
    });

    await expect(result).rejects.toThrow("boom");
    expect(sawAbort).toBe(true);
  });

  it("should reject with CancelledError when the caller aborts", async () => {
    const controller = new AbortController();

    const result = runPool(
      [1],
      1,
      (_n, signal) =>
        new Promise<number>((_resolve, reject) => {
          signal.addEventListener("abort", () => {
            reject(new Error("stopped"));
          });
        }),
      controller.signal
    );
    controller.abort();

    await expect(result).rejects.toBeInstanceOf(CancelledError);
  });

  it("should not start any worker when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      runPool(
        [1],
        1,
        () => {
          calls++;
          return Promise.resolve(1);
        },
        controller.signal
      )
    ).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(0);
  });
});
