/**
 * Retry Utility Tests
 */

import { describe, it, expect, vi } from "vitest";
import { calculateDelay, retryWithBackoff } from "../../../src/utils/retry.js";
import { TransactionBuildError, ValidationError } from "../../../src/utils/errors.js";

describe("retryWithBackoff", () => {
  it("should return the value with the attempt count", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("done");

    const result = await retryWithBackoff(fn, { maxRetries: 3, baseDelayMs: 0 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.value).toBe("done");
      expect(result.value.attempts).toBe(2);
    }
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
  });

  it("should report exhaustion after maxRetries attempts", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn(async () => {
      throw new Error("down");
    });

    const result = await retryWithBackoff(fn, {
      maxRetries: 3,
      baseDelayMs: 0,
      operationName: "fetch_slot",
      onRetry,
    });

    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("RETRY_EXHAUSTED");
      expect(result.error.attempts).toBe(3);
      expect(result.error.message).toBe("Retry exhausted for fetch_slot after 3 attempts: down");
    }
  });

  it("should stop at non-retryable errors", async () => {
    for (const error of [new ValidationError("bad input"), new TransactionBuildError("bad tx")]) {
      const fn = vi.fn(async () => {
        throw error;
      });

      const result = await retryWithBackoff(fn, { maxRetries: 5, baseDelayMs: 0 });

      expect(fn).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("NON_RETRYABLE");
        expect(result.error.originalError).toBe(error);
      }
    }
  });

  it("should honor a custom retry policy", async () => {
    const fn = vi.fn(async () => {
      throw new Error("429");
    });

    await retryWithBackoff(fn, {
      maxRetries: 4,
      baseDelayMs: 0,
      retryPolicy: (_error, attempt) => attempt < 1,
    });

    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe("calculateDelay", () => {
  it("should grow exponentially and respect the cap", () => {
    expect([0, 1, 2, 3].map((n) => calculateDelay(n, 1000, 0, 5000))).toEqual([
      1000, 2000, 4000, 5000,
    ]);
  });

  it("should keep jittered delays within the range", () => {
    for (let i = 0; i < 20; i++) {
      const delay = calculateDelay(2, 1000, 0.1, 30_000);
      expect(delay).toBeGreaterThanOrEqual(3600);
      expect(delay).toBeLessThanOrEqual(4400);
    }
  });
});
