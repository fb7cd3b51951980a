/**
 * Common types shared by the RPC and bundle layers.
 */

// ============================================================================
// Result<T> Pattern - expected failures are values, not exceptions
// ============================================================================

export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({
  success: true,
  value,
});

export const Err = <E>(error: E): Result<never, E> => ({
  success: false,
  error,
});

// ============================================================================
// Amounts - integer base units only
// ============================================================================

/** Lamports (1 SOL = 1e9 lamports). */
export type Lamports = bigint;

/** Raw SPL token amount, before applying mint decimals. */
export type TokenUnits = bigint;

export const LAMPORTS_PER_SOL = 1_000_000_000n;

/** Base58 transaction signature. */
export type TransactionSignature = string;
