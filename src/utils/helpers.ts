/**
 * Helper utilities for common operations
 */

import { LAMPORTS_PER_SOL, type Lamports } from "../types/common.js";
import { OperationCancelledError } from "./errors.js";

/**
 * Sleep for specified milliseconds. Rejects with OperationCancelledError as
 * soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with OperationCancelledError as soon as
 * `signal` aborts. The underlying work is not stopped, only awaited no longer.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new OperationCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Truncate address for display
 */
export function truncateAddress(address: string, chars = 4): string {
  if (address.length <= chars * 2) return address;
  return `${address.slice(0, chars)}...${address.slice(-chars)}`;
}

/**
 * Convert lamports to SOL. Display only.
 */
export function lamportsToSol(lamports: Lamports): number {
  return Number(lamports) / 1e9;
}

/**
 * Convert a SOL amount to lamports through its decimal representation, so
 * 0.3 becomes exactly 300000000n.
 */
export function solToLamports(sol: number): Lamports {
  if (sol < 0 || !Number.isFinite(sol)) {
    throw new TypeError("SOL amount must be non-negative finite number");
  }
  const [whole, fraction = ""] = sol.toFixed(9).split(".");
  return BigInt(whole) * LAMPORTS_PER_SOL + BigInt(fraction.padEnd(9, "0"));
}

const FRACTION_SCALE = 1_000_000_000n;

/**
 * floor(amount * fraction) for fraction in [0, 1], in integer arithmetic.
 * The fraction is fixed to nine decimal places; 1 yields amount exactly.
 */
export function applyFraction(amount: bigint, fraction: number): bigint {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new RangeError(`Fraction must be within [0, 1], got ${fraction}`);
  }
  // Round to the nearest step, then step down if that overshoots the fraction
  let scaled = Math.round(fraction * Number(FRACTION_SCALE));
  if (scaled / Number(FRACTION_SCALE) > fraction) scaled -= 1;
  return (amount * BigInt(scaled)) / FRACTION_SCALE;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Clamp number between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Endpoint label for logs and metrics. Keeps the origin and drops anything
 * that may carry an API key.
 */
export function redactEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint);
    return `${url.protocol}//${url.host}`;
  } catch {
    return "invalid-url";
  }
}
