import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "./bounded-pool.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("mapWithConcurrency", () => {
  it("keeps input order when later items finish first", async () => {
    const results = await mapWithConcurrency([30, 5, 15], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:5", "2:15"]);
  });

  it("never exceeds the in-flight limit", async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
    });

    expect(peak).toBe(2);
  });

  it("runs one item at a time with a limit of 1", async () => {
    const events: string[] = [];

    await mapWithConcurrency(["a", "b"], 1, async (item) => {
      events.push(`start:${item}`);
      await delay(1);
      events.push(`end:${item}`);
    });

    expect(events).toEqual(["start:a", "end:a", "start:b", "end:b"]);
  });

  it("returns an empty list for no items", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
