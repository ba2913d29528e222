import { mapWithConcurrency } from "../../src/utils/mapWithConcurrency";

describe("mapWithConcurrency", () => {
  it("keeps input order", async () => {
    const delays = [30, 10, 20, 0];
    const results = await mapWithConcurrency(delays, 2, async (ms, i) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return `${i}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20", "3:0"]);
  });

  it("never runs more than the limit at once", async () => {
    let running = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });

    expect(peak).toBe(3);
  });

  it("returns an empty list for no items", async () => {
    expect(await mapWithConcurrency([], 4, async (x: number) => x)).toEqual([]);
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(mapWithConcurrency([1], 0, async (x) => x)).rejects.toThrow(
      "concurrency must be a positive integer, got 0"
    );
  });

  it("propagates a rejected call", async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (x) => {
        if (x === 2) throw new Error("boom");
        return x;
      })
    ).rejects.toThrow("boom");
  });
});
