import { describe, expect, it } from "vitest";
import { backoffDelay, decideRetry } from "./retryPolicy";

describe("retryPolicy", () => {
  it("doubles the delay per attempt and caps it", () => {
    expect([0, 1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt))).toEqual([
      1000, 2000, 4000, 8000, 10_000, 10_000
    ]);
  });

  it("honors a custom base and cap", () => {
    expect(backoffDelay(0, { baseDelayMs: 10, maxDelayMs: 25 })).toBe(10);
    expect(backoffDelay(2, { baseDelayMs: 10, maxDelayMs: 25 })).toBe(25);
  });

  it("retries transient failures until the ceiling", () => {
    expect(decideRetry(0, 3, "transient")).toEqual({ shouldRetry: true, delayMs: 1000 });
    expect(decideRetry(2, 3, "transient")).toEqual({ shouldRetry: true, delayMs: 4000 });
    expect(decideRetry(3, 3, "transient").shouldRetry).toBe(false);
  });

  it("never retries permanent failures", () => {
    expect(decideRetry(0, 3, "permanent").shouldRetry).toBe(false);
    expect(decideRetry(0, 0, "transient").shouldRetry).toBe(false);
  });
});
