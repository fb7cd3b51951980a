/**
 * Bundle types: relay contract, instruction builder contract and the
 * results the coordinator hands back.
 */

import type { PublicKey, TransactionInstruction, VersionedTransaction } from "@solana/web3.js";
import type { Lamports, TokenUnits } from "./common.js";

// ============================================================================
// Relay
// ============================================================================

export type RelayErrorType =
  | "BUNDLE_INVALID"
  | "BUNDLE_REJECTED"
  | "BUNDLE_FAILED"
  | "BUNDLE_TIMEOUT"
  | "RATE_LIMITED"
  | "NETWORK_ERROR";

export interface RelaySubmission {
  success: boolean;
  bundleId?: string;
  errorMessage?: string;
  errorType?: RelayErrorType;
  landedSlot?: number;
}

/**
 * External service that lands a set of signed transactions atomically.
 * Implementations report failure in the result and do not throw.
 */
export interface BundleRelay {
  submit(transactions: VersionedTransaction[], tipLamports: Lamports): Promise<RelaySubmission>;
}

// ============================================================================
// Instruction Builder
// ============================================================================

/**
 * Opaque description of what is being traded. Builders may extend it with
 * whatever their program needs (pool addresses, slippage, ...).
 */
export interface BundleTarget {
  mint: PublicKey;
  /** Token program owning the mint; defaults to SPL Token */
  tokenProgramId?: PublicKey;
}

/**
 * Program-specific instruction encoding, supplied by the caller.
 */
export interface InstructionBuilder<TTarget extends BundleTarget = BundleTarget> {
  buildBuyInstructions(
    target: TTarget,
    owner: PublicKey,
    amountLamports: Lamports
  ): Promise<TransactionInstruction[]>;
  buildSellInstructions(
    target: TTarget,
    owner: PublicKey,
    tokenAmount: TokenUnits
  ): Promise<TransactionInstruction[]>;
  getBuyComputeUnitLimit(): number;
  getSellComputeUnitLimit(): number;
}

// ============================================================================
// Coordinator
// ============================================================================

export type BundleAttemptState =
  | "building"
  | "submitted"
  | "landed"
  | "failed"
  | "final_failure";

export interface BundleAttempt {
  attempt: number;
  tipLamports: Lamports;
  transactionCount: number;
  state: BundleAttemptState;
  bundleId?: string;
  errorMessage?: string;
}

export type IdentityOutcome =
  | { index: number; status: "included" }
  | { index: number; status: "skipped"; reason: string };

export interface BundleResult {
  success: boolean;
  bundleId?: string;
  errorMessage?: string;
  errorType?: RelayErrorType | "NO_TRANSACTIONS" | "CANCELLED";
  /** Tip of the attempt that landed; 0 when nothing landed */
  tipPaidLamports: Lamports;
  transactionsSubmitted: number;
  attempts: BundleAttempt[];
  identities: IdentityOutcome[];
}

export interface BundleCoordinatorConfig {
  initialTipLamports: Lamports;
  tipIncrementLamports: Lamports;
  maxTipLamports: Lamports;
  maxRetries: number;
  retryDelayMs: number;
  /** Compute unit price for every bundled transaction */
  priorityFeeMicroLamports: number;
}

export interface BundleExecutionOptions {
  /** Defaults to every identity in the pool */
  identityIndices?: number[];
  tipLamports?: Lamports;
  /** Cancels the wait between attempts; the result reports the cancellation */
  signal?: AbortSignal;
}

export interface BundleCoordinatorStats {
  totalBundles: number;
  successfulBundles: number;
  successRate: number;
  identityCount: number;
}
