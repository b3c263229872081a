import { describe, it, expect, vi } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import { runPool } from "./pool";

describe("runPool", () => {
  it("never runs more tasks than slots", async () => {
    let active = 0;
    let maxActive = 0;

    const results = await runPool([5, 1, 3, 2, 4, 1], 2, async (ms) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(ms);
      active--;
      return ms;
    });

    expect(maxActive).toBe(2);
    expect([...results].sort()).toEqual([1, 1, 2, 3, 4, 5]);
  });

  it("returns results in completion order", async () => {
    const delays = [100, 5, 10, 1];

    const results = await runPool(delays, 2, async (ms, index) => {
      await sleep(ms);
      return index;
    });

    expect(results).toEqual([1, 2, 3, 0]);
  });

  it("reports each result once as it settles", async () => {
    const onSettled = vi.fn();

    const results = await runPool(["a", "b", "c"], 3, async (s) => s.toUpperCase(), onSettled);

    expect(onSettled).toHaveBeenCalledTimes(3);
    expect(onSettled.mock.calls.map(([result]) => result)).toEqual(results);
  });

  it("does not start more slots than items", async () => {
    let active = 0;
    let maxActive = 0;

    await runPool([1, 2], 8, async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(5);
      active--;
    });

    expect(maxActive).toBe(2);
  });

  it("handles an empty list", async () => {
    const task = vi.fn(async () => 1);

    await expect(runPool([], 4, task)).resolves.toEqual([]);
    expect(task).not.toHaveBeenCalled();
  });
});
