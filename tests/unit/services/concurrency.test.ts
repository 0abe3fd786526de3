import { describe, expect, it } from "vitest";
import { mapWithConcurrency, mapWithConcurrencyUntilAborted } from "../../../src/services/concurrency.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("mapWithConcurrency", () => {
  it("keeps input order and bounds parallelism", async () => {
    let active = 0;
    let peak = 0;

    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return n * 10;
    });

    expect(results).toEqual([10, 20, 30, 40, 50, 60]);
    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    expect(await mapWithConcurrency<number, number>([], 4, async (n) => n)).toEqual([]);
  });
});

describe("mapWithConcurrencyUntilAborted", () => {
  it("leaves items unstarted after an abort", async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const results = await mapWithConcurrencyUntilAborted(
      [1, 2, 3, 4],
      1,
      async (n) => {
        started.push(n);
        if (n === 2) controller.abort();
        return n;
      },
      controller.signal
    );

    expect(started).toEqual([1, 2]);
    expect(results).toEqual([1, 2, { started: false }, { started: false }]);
  });

  it("starts nothing when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await mapWithConcurrencyUntilAborted([1, 2], 2, async (n) => n, controller.signal);

    expect(results).toEqual([{ started: false }, { started: false }]);
  });
});
