import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { runWorkerPool } from "../../src/engine/worker-pool.js";

async function* numbers(count: number, onClose?: () => void): AsyncGenerator<number> {
  try {
    for (let value = 0; value < count; value += 1) {
      yield value;
    }
  } finally {
    onClose?.();
  }
}

describe("worker pool", () => {
  it("processes every item without exceeding the concurrency bound", async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];

    const outcome = await runWorkerPool(
      numbers(20),
      async (value) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await delay(value % 3);
        seen.push(value);
        inFlight -= 1;
      },
      { concurrency: 3 },
    );

    expect(outcome).toEqual({ processed: 20, aborted: false });
    expect(peak).toBeLessThanOrEqual(3);
    expect([...seen].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i));
  });

  it("stops taking items once aborted and closes the source", async () => {
    const controller = new AbortController();
    let closed = false;
    const seen: number[] = [];

    const outcome = await runWorkerPool(
      numbers(100, () => {
        closed = true;
      }),
      async (value) => {
        seen.push(value);
        if (value === 2) {
          controller.abort();
        }
      },
      { concurrency: 1, signal: controller.signal },
    );

    expect(seen).toEqual([0, 1, 2]);
    expect(outcome).toEqual({ processed: 3, aborted: true });
    expect(closed).toBe(true);
  });

  it("takes nothing from an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const seen: number[] = [];

    const outcome = await runWorkerPool(numbers(5), async (value) => {
      seen.push(value);
    }, { concurrency: 4, signal: controller.signal });

    expect(seen).toEqual([]);
    expect(outcome.aborted).toBe(true);
  });

  it("rethrows a handler failure after every worker has stopped", async () => {
    let finished = 0;

    await expect(
      runWorkerPool(
        numbers(10),
        async (value) => {
          if (value === 1) {
            throw new Error("boom");
          }
          await delay(5);
          finished += 1;
        },
        { concurrency: 2 },
      ),
    ).rejects.toThrow("boom");

    expect(finished).toBeLessThan(9);
  });
});
