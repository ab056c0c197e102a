import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "@/lib/concurrency";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
  it("never exceeds the limit and keeps input order", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency(
      Array.from({ length: 20 }, (_, index) => index),
      4,
      async (item) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await delay(item % 3);
        inFlight -= 1;
        return item * 2;
      }
    );

    expect(peak).toBe(4);
    expect(results).toEqual(Array.from({ length: 20 }, (_, index) => index * 2));
  });

  it("stops scheduling after a failure and rejects with it", async () => {
    const started: number[] = [];

    await expect(
      mapWithConcurrency([0, 1, 2, 3, 4, 5], 1, async (item) => {
        started.push(item);
        if (item === 2) {
          throw new Error("boom");
        }
        return item;
      })
    ).rejects.toThrow("boom");

    expect(started).toEqual([0, 1, 2]);
  });

  it("returns an empty list for no items", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
