import { describe, it, expect, vi } from "vitest";
import { RetryExhaustedError, RetryStrategy } from "./retry.js";
import { IdempotencyLevel } from "../core/types.js";

class Flaky extends Error {
  readonly retryable = true;
  readonly errorType = "Flaky";
}

describe("RetryStrategy", () => {
  it("treats maxRetries as the total number of attempts", async () => {
    const strategy = new RetryStrategy({ maxRetries: 3, baseDelay: 0, jitter: false });
    const fn = vi.fn(async () => {
      throw new Flaky("boom");
    });

    const error = await strategy.execute(fn, IdempotencyLevel.SAFE).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.failures).toEqual([
        { attempt: 1, errorType: "Flaky", message: "boom" },
        { attempt: 2, errorType: "Flaky", message: "boom" },
        { attempt: 3, errorType: "Flaky", message: "boom" },
      ]);
    }
  });

  it("makes one attempt for unsafe operations", async () => {
    const strategy = new RetryStrategy({ maxRetries: 5, baseDelay: 0 });
    const fn = vi.fn(async () => {
      throw new Flaky("boom");
    });

    await expect(strategy.execute(fn, IdempotencyLevel.UNSAFE)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("propagates errors that are not marked retryable", async () => {
    const strategy = new RetryStrategy({ baseDelay: 0 });
    const fn = vi.fn(async () => {
      throw new Error("plain");
    });

    await expect(strategy.execute(fn, IdempotencyLevel.SAFE)).rejects.toThrow("plain");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("reports the attempt count of a late success", async () => {
    const strategy = new RetryStrategy({ baseDelay: 0, jitter: false });
    let calls = 0;
    const outcome = await strategy.execute(async () => {
      calls++;
      if (calls < 2) throw new Flaky("once");
      return "done";
    }, IdempotencyLevel.IDEMPOTENT);

    expect(outcome).toEqual({ value: "done", attempts: 2 });
  });

  it("notifies the listener of every failed attempt", async () => {
    const strategy = new RetryStrategy({ maxRetries: 2, baseDelay: 0 });
    const listener = vi.fn();

    await strategy
      .execute(async () => {
        throw new Flaky("boom");
      }, IdempotencyLevel.SAFE, listener)
      .catch(() => undefined);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith({ attempt: 2, errorType: "Flaky", message: "boom" }, 2);
  });

  describe("calculateDelay", () => {
    it("doubles per retry and caps at maxDelay", () => {
      const strategy = new RetryStrategy({ baseDelay: 250, maxDelay: 1500, jitter: false });
      expect(strategy.calculateDelay(0)).toBe(250);
      expect(strategy.calculateDelay(1)).toBe(500);
      expect(strategy.calculateDelay(2)).toBe(1000);
      expect(strategy.calculateDelay(3)).toBe(1500);
    });

    it("adds at most one base delay of jitter", () => {
      const strategy = new RetryStrategy({ baseDelay: 100, maxDelay: 10000, jitter: true });
      const delay = strategy.calculateDelay(1);
      expect(delay).toBeGreaterThanOrEqual(200);
      expect(delay).toBeLessThan(300);
    });

    it("prefers a Retry-After date, capped at maxDelay", () => {
      const strategy = new RetryStrategy({ baseDelay: 100, maxDelay: 5000, jitter: false });
      const soon = new Date(Date.now() + 60_000);
      expect(strategy.calculateDelay(0, soon)).toBe(5000);
      expect(strategy.calculateDelay(0, new Date(Date.now() - 1000))).toBe(0);
    });
  });
});
