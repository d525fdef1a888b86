import { describe, expect, it } from "vitest";
import { createBackoff, exponentialBackoff, fixedBackoff } from "../../src/rpc/backoff.js";

describe("backoff strategies", () => {
  it("fixed backoff waits the same delay after every attempt", () => {
    const backoff = fixedBackoff(1000);
    expect([1, 2, 3].map(backoff)).toEqual([1000, 1000, 1000]);
  });

  it("exponential backoff doubles up to the cap", () => {
    const backoff = exponentialBackoff({ initialMs: 250, maxMs: 1500 });
    expect([1, 2, 3, 4, 5].map(backoff)).toEqual([250, 500, 1000, 1500, 1500]);
  });

  it("applies jitter as a factor of the delay", () => {
    const backoff = exponentialBackoff({ initialMs: 1000, maxMs: 10_000, jitter: () => 0.5 });
    expect(backoff(1)).toBe(500);
    expect(backoff(3)).toBe(2000);
  });

  it("builds strategies by kind", () => {
    expect(createBackoff("fixed", 750, 8000)(4)).toBe(750);
    const exponential = createBackoff("exponential", 1000, 4000)(10);
    expect(exponential).toBeGreaterThanOrEqual(0);
    expect(exponential).toBeLessThanOrEqual(4000);
  });
});
