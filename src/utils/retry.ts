/**
 * Retry with exponential backoff.
 *
 * Usage:
 * ```typescript
 * const result = await retryWithBackoff(
 *   () => connection.sendRawTransaction(raw),
 *   { maxRetries: 3, baseDelayMs: 1000, operationName: "send_transaction" }
 * );
 * ```
 */

import client from "prom-client";
import { logger } from "./logger.js";
import { register } from "./metrics.js";
import { sleep } from "./helpers.js";
import {
  OperationCancelledError,
  TransactionBuildError,
  ValidationError,
  toError,
} from "./errors.js";
import { Ok, Err, type Result } from "../types/common.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Decides whether an error is worth another attempt.
 */
export type RetryPolicy = (error: Error, attemptNumber: number) => boolean;

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxRetries: number;

  baseDelayMs: number;

  /** Default: 30000ms */
  maxDelayMs?: number;

  /** Fraction of the delay randomized in either direction. Default: 0 */
  jitterFactor?: number;

  retryPolicy?: RetryPolicy;

  /** Operation name for logging and metrics */
  operationName?: string;

  /** Aborts a pending backoff sleep */
  signal?: AbortSignal;

  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

export interface RetryResult<T> {
  value: T;

  /** 1 = success on first try */
  attempts: number;

  totalTimeMs: number;
}

export interface RetryError {
  type: "RETRY_EXHAUSTED" | "NON_RETRYABLE";
  originalError: Error;
  attempts: number;
  totalTimeMs: number;
  message: string;
}

// ============================================================================
// Prometheus Metrics
// ============================================================================

const retryAttemptsTotal = new client.Counter({
  name: "retry_attempts_total",
  help: "Total number of attempts made under retry",
  labelNames: ["operation", "attempt_number"],
  registers: [register],
});

const retryExhaustedTotal = new client.Counter({
  name: "retry_exhausted_total",
  help: "Total retries exhausted (all attempts failed)",
  labelNames: ["operation"],
  registers: [register],
});

const retryDelayHistogram = new client.Histogram({
  name: "retry_delay_milliseconds",
  help: "Retry delay duration in milliseconds",
  labelNames: ["operation"],
  buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

// ============================================================================
// Retry Policies
// ============================================================================

/**
 * Retry everything except programming errors, invalid input, build failures
 * and cancellation.
 */
export const defaultRetryPolicy: RetryPolicy = (error: Error) => {
  if (error instanceof TypeError) return false;
  if (error instanceof ValidationError) return false;
  if (error instanceof TransactionBuildError) return false;
  if (error instanceof OperationCancelledError) return false;
  return true;
};

// ============================================================================
// Delay Calculation
// ============================================================================

/**
 * baseDelay * 2^attempt, randomized by ±jitterFactor and capped at maxDelayMs.
 */
export function calculateDelay(
  attemptNumber: number,
  baseDelayMs: number,
  jitterFactor: number,
  maxDelayMs: number
): number {
  let delay = baseDelayMs * Math.pow(2, attemptNumber);

  if (jitterFactor > 0) {
    const jitterRange = delay * jitterFactor;
    delay += (Math.random() * 2 - 1) * jitterRange;
  }

  return Math.floor(Math.max(0, Math.min(delay, maxDelayMs)));
}

// ============================================================================
// Main Retry Function
// ============================================================================

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<Result<RetryResult<T>, RetryError>> {
  const {
    maxRetries,
    baseDelayMs,
    maxDelayMs = 30_000,
    jitterFactor = 0,
    retryPolicy = defaultRetryPolicy,
    operationName = "unknown",
    signal,
    onRetry,
  } = options;

  const startTime = Date.now();
  let lastError: Error = new Error("No attempts made");

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    retryAttemptsTotal.inc({
      operation: operationName,
      attempt_number: attempt + 1,
    });

    try {
      const value = await fn(attempt);
      const totalTimeMs = Date.now() - startTime;

      if (attempt > 0) {
        logger.info("Retry succeeded", {
          operation: operationName,
          attempts: attempt + 1,
          totalTimeMs,
        });
      }

      return Ok({ value, attempts: attempt + 1, totalTimeMs });
    } catch (error) {
      lastError = toError(error);

      if (!retryPolicy(lastError, attempt)) {
        logger.warn("Non-retryable error, failing immediately", {
          operation: operationName,
          attempt: attempt + 1,
          error: lastError.message,
        });

        return Err({
          type: "NON_RETRYABLE",
          originalError: lastError,
          attempts: attempt + 1,
          totalTimeMs: Date.now() - startTime,
          message: `Non-retryable error in ${operationName}: ${lastError.message}`,
        });
      }

      if (attempt < maxRetries - 1) {
        const delayMs = calculateDelay(
          attempt,
          baseDelayMs,
          jitterFactor,
          maxDelayMs
        );

        retryDelayHistogram.observe({ operation: operationName }, delayMs);

        logger.debug("Retrying after error", {
          operation: operationName,
          attempt: attempt + 1,
          maxRetries,
          delayMs,
          error: lastError.message,
        });

        onRetry?.(lastError, attempt + 1, delayMs);

        await sleep(delayMs, signal);
      }
    }
  }

  retryExhaustedTotal.inc({ operation: operationName });

  const totalTimeMs = Date.now() - startTime;

  logger.error("Retry exhausted", {
    operation: operationName,
    attempts: maxRetries,
    totalTimeMs,
    lastError: lastError.message,
  });

  return Err({
    type: "RETRY_EXHAUSTED",
    originalError: lastError,
    attempts: maxRetries,
    totalTimeMs,
    message: `Retry exhausted for ${operationName} after ${maxRetries} attempts: ${lastError.message}`,
  });
}
