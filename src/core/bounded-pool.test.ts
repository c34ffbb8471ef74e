import { describe, expect, it } from "vitest";

import { runBoundedPool } from "./bounded-pool.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("runBoundedPool", () => {
  it("never runs more units than the concurrency bound", async () => {
    let active = 0;
    let peak = 0;

    const result = await runBoundedPool([1, 2, 3, 4, 5, 6, 7], { concurrency: 3 }, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
    });

    expect(peak).toBe(3);
    expect(result).toEqual({ started: 7, abandoned: 0 });
  });

  it("keeps processing siblings when one unit rejects", async () => {
    const seen: string[] = [];

    const run = runBoundedPool(["a", "b", "c"], { concurrency: 1 }, async (item) => {
      seen.push(item);
      if (item === "a") throw new Error("unit a failed");
    });

    await expect(run).rejects.toThrow("unit a failed");
    expect(seen).toEqual(["a", "b", "c"]);
  });

  it("abandons units that have not started once aborted", async () => {
    const controller = new AbortController();
    const gate = deferred();
    const finished: number[] = [];

    const run = runBoundedPool([1, 2, 3, 4], { concurrency: 2, signal: controller.signal }, async (item) => {
      if (item <= 2) await gate.promise;
      finished.push(item);
    });

    controller.abort("SIGINT");
    gate.resolve();

    await expect(run).resolves.toEqual({ started: 2, abandoned: 2 });
    expect(finished.sort()).toEqual([1, 2]);
  });

  it("rejects a non-positive bound", async () => {
    await expect(runBoundedPool([1], { concurrency: 0 }, async () => undefined)).rejects.toThrow(
      RangeError,
    );
  });
});
