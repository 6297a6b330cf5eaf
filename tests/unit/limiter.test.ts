/**
 * Unit tests for the concurrency limiter
 */

import { describe, it, expect } from "vitest";
import { createLimiter } from "@/utils";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("createLimiter", () => {
  it("runs at most N tasks at once and resolves each with its value", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        limit(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await delay(5);
          active -= 1;
          return n * 10;
        }),
      ),
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it("keeps draining the queue after a task rejects", async () => {
    const limit = createLimiter(1);

    const first = limit(async () => {
      throw new Error("first failed");
    });
    const second = limit(async () => "second");

    await expect(first).rejects.toThrow("first failed");
    await expect(second).resolves.toBe("second");
  });

  it("rejects invalid concurrency", () => {
    expect(() => createLimiter(0)).toThrow("concurrency must be an integer >= 1");
    expect(() => createLimiter(1.5)).toThrow("concurrency must be an integer >= 1");
  });
});
