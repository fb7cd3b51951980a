/**
 * Coordinates one trade across many pool identities as a single atomic
 * bundle, raising the tip on each failed submission.
 */

import { getAssociatedTokenAddressSync, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import type {
  Keypair,
  PublicKey,
  TransactionInstruction,
  VersionedTransaction,
} from "@solana/web3.js";
import type {
  BundleAttempt,
  BundleCoordinatorConfig,
  BundleCoordinatorStats,
  BundleExecutionOptions,
  BundleRelay,
  BundleResult,
  BundleTarget,
  IdentityOutcome,
  InstructionBuilder,
  RelaySubmission,
} from "../../types/bundle.js";
import type { Lamports, TokenUnits } from "../../types/common.js";
import type { Identity } from "../../types/identityPool.js";
import { OperationCancelledError, ValidationError, errorMessage } from "../../utils/errors.js";
import { applyFraction, lamportsToSol, minBigInt, sleep } from "../../utils/helpers.js";
import { createChildLogger } from "../../utils/logger.js";
import { recordBundleSubmission } from "../../utils/metrics.js";
import type { BuildTransactionOptions } from "../blockchain/resilientClient.js";

const logger = createChildLogger({ component: "bundle-coordinator" });

const DEFAULT_CONFIG: BundleCoordinatorConfig = {
  initialTipLamports: 100_000_000n,
  tipIncrementLamports: 50_000_000n,
  maxTipLamports: 1_000_000_000n,
  maxRetries: 3,
  retryDelayMs: 1_000,
  priorityFeeMicroLamports: 100_000,
};

/** Client surface the coordinator needs. ResilientClient satisfies it. */
export interface BundleClient {
  buildTransaction(
    instructions: TransactionInstruction[],
    signer: Keypair,
    options?: BuildTransactionOptions
  ): Promise<VersionedTransaction>;
  getTokenAccountBalance(tokenAccount: PublicKey): Promise<TokenUnits>;
}

/** Pool surface the coordinator needs. IdentityPool satisfies it. */
export interface BundleIdentitySource {
  getIdentity(index: number): Identity;
  getCount(): number;
  recordUsage(index: number): void;
}

interface BuiltTransaction {
  index: number;
  transaction: VersionedTransaction;
}

export class BundleCoordinator<TTarget extends BundleTarget = BundleTarget> {
  private readonly config: BundleCoordinatorConfig;
  private totalBundles = 0;
  private successfulBundles = 0;

  constructor(
    private readonly client: BundleClient,
    private readonly pool: BundleIdentitySource,
    private readonly relay: BundleRelay,
    private readonly instructions: InstructionBuilder<TTarget>,
    config: Partial<BundleCoordinatorConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (this.config.maxRetries < 1) {
      throw new ValidationError("maxRetries must be at least 1");
    }
    if (this.config.maxTipLamports < this.config.initialTipLamports) {
      throw new ValidationError("maxTipLamports must be >= initialTipLamports");
    }
  }

  // ==========================================================================
  // Buy
  // ==========================================================================

  /**
   * Buy `amountPerIdentity` with every selected identity in one bundle.
   * Identities whose transaction cannot be built are left out.
   */
  async executeBuy(
    target: TTarget,
    amountPerIdentity: Lamports,
    options: BundleExecutionOptions = {}
  ): Promise<BundleResult> {
    if (amountPerIdentity <= 0n) {
      throw new ValidationError(`Buy amount must be positive, got ${amountPerIdentity}`);
    }

    const indices = this.resolveIndices(options.identityIndices);

    logger.info("Building bundle buy", {
      mint: target.mint.toBase58(),
      identities: indices.length,
      amountPerIdentitySol: lamportsToSol(amountPerIdentity),
    });

    const settled = await Promise.allSettled(
      indices.map(async (index): Promise<BuiltTransaction> => {
        const identity = this.pool.getIdentity(index);
        const instructions = await this.instructions.buildBuyInstructions(
          target,
          identity.publicKey,
          amountPerIdentity
        );
        const transaction = await this.client.buildTransaction(instructions, identity.keypair, {
          computeUnitLimit: this.instructions.getBuyComputeUnitLimit(),
          priorityFeeMicroLamports: this.config.priorityFeeMicroLamports,
        });
        return { index, transaction };
      })
    );

    const built: BuiltTransaction[] = [];
    const identities: IdentityOutcome[] = [];

    settled.forEach((outcome, position) => {
      const index = indices[position];
      if (outcome.status === "fulfilled") {
        built.push(outcome.value);
        identities.push({ index, status: "included" });
      } else {
        const reason = errorMessage(outcome.reason);
        logger.warn("Skipping identity, buy build failed", { index, error: reason });
        identities.push({ index, status: "skipped", reason });
      }
    });

    return this.submitBuilt(built, identities, options);
  }

  // ==========================================================================
  // Sell
  // ==========================================================================

  /**
   * Sell `percentage` of each selected identity's token balance in one
   * bundle. A percentage of 1 sells the exact balance.
   *
   * @throws {ValidationError} when percentage is outside (0, 1]
   */
  async executePercentageSell(
    target: TTarget,
    percentage: number,
    options: BundleExecutionOptions = {}
  ): Promise<BundleResult> {
    if (!Number.isFinite(percentage) || percentage <= 0 || percentage > 1) {
      throw new ValidationError(`Sell percentage must be in (0, 1], got ${percentage}`);
    }

    const indices = this.resolveIndices(options.identityIndices);
    const tokenProgramId = target.tokenProgramId ?? TOKEN_PROGRAM_ID;

    logger.info("Building bundle sell", {
      mint: target.mint.toBase58(),
      identities: indices.length,
      percentage,
    });

    const settled = await Promise.allSettled(
      indices.map(async (index): Promise<BuiltTransaction | null> => {
        const identity = this.pool.getIdentity(index);
        const balance = await this.readTokenBalance(identity, target, tokenProgramId);
        identity.tokenBalance = balance;

        const amount = applyFraction(balance, percentage);
        if (amount === 0n) return null;

        const instructions = await this.instructions.buildSellInstructions(
          target,
          identity.publicKey,
          amount
        );
        const transaction = await this.client.buildTransaction(instructions, identity.keypair, {
          computeUnitLimit: this.instructions.getSellComputeUnitLimit(),
          priorityFeeMicroLamports: this.config.priorityFeeMicroLamports,
        });
        return { index, transaction };
      })
    );

    const built: BuiltTransaction[] = [];
    const identities: IdentityOutcome[] = [];

    settled.forEach((outcome, position) => {
      const index = indices[position];
      if (outcome.status === "rejected") {
        const reason = errorMessage(outcome.reason);
        logger.warn("Skipping identity, sell build failed", { index, error: reason });
        identities.push({ index, status: "skipped", reason });
      } else if (outcome.value === null) {
        identities.push({ index, status: "skipped", reason: "No tokens to sell" });
      } else {
        built.push(outcome.value);
        identities.push({ index, status: "included" });
      }
    });

    return this.submitBuilt(built, identities, options);
  }

  /** A missing token account reads as zero. */
  private async readTokenBalance(
    identity: Identity,
    target: TTarget,
    tokenProgramId: PublicKey
  ): Promise<TokenUnits> {
    const tokenAccount = getAssociatedTokenAddressSync(
      target.mint,
      identity.publicKey,
      false,
      tokenProgramId
    );
    try {
      return await this.client.getTokenAccountBalance(tokenAccount);
    } catch (error) {
      logger.debug("Token balance unavailable, treating as zero", {
        index: identity.index,
        error: errorMessage(error),
      });
      return 0n;
    }
  }

  // ==========================================================================
  // Submission
  // ==========================================================================

  private resolveIndices(requested: number[] | undefined): number[] {
    if (requested) return requested;
    return Array.from({ length: this.pool.getCount() }, (_, index) => index);
  }

  private async submitBuilt(
    built: BuiltTransaction[],
    identities: IdentityOutcome[],
    options: BundleExecutionOptions
  ): Promise<BundleResult> {
    if (built.length === 0) {
      logger.error("No transactions built, nothing to submit");
      return {
        success: false,
        errorMessage: "No transactions built",
        errorType: "NO_TRANSACTIONS",
        tipPaidLamports: 0n,
        transactionsSubmitted: 0,
        attempts: [],
        identities,
      };
    }

    const result = await this.submitWithRetry(
      built.map((entry) => entry.transaction),
      options.tipLamports ?? this.config.initialTipLamports,
      this.config.maxRetries,
      options.signal
    );

    if (result.success) {
      for (const entry of built) {
        this.pool.recordUsage(entry.index);
      }
    }

    return { ...result, identities };
  }

  /**
   * Submit the bundle up to `maxRetries` times. After each failure the tip
   * grows by the configured increment, capped at the maximum. Relay
   * failures, thrown or reported, and cancellation end up in the result.
   */
  async submitWithRetry(
    transactions: VersionedTransaction[],
    initialTip: Lamports,
    maxRetries: number,
    signal?: AbortSignal
  ): Promise<BundleResult> {
    const attempts: BundleAttempt[] = [];
    let tip = initialTip;
    let lastError: BundleResult = {
      success: false,
      errorMessage: "Bundle was not submitted",
      tipPaidLamports: 0n,
      transactionsSubmitted: transactions.length,
      attempts,
      identities: [],
    };

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const record: BundleAttempt = {
        attempt,
        tipLamports: tip,
        transactionCount: transactions.length,
        state: "building",
      };
      attempts.push(record);

      logger.info("Submitting bundle", {
        attempt,
        maxRetries,
        tipSol: lamportsToSol(tip),
        transactions: transactions.length,
      });

      record.state = "submitted";
      const submission = await this.submitOnce(transactions, tip);
      this.totalBundles++;
      record.bundleId = submission.bundleId;

      if (submission.success) {
        record.state = "landed";
        this.successfulBundles++;
        recordBundleSubmission("landed", tip);

        logger.info("Bundle landed", {
          bundleId: submission.bundleId,
          attempt,
          tipSol: lamportsToSol(tip),
        });

        return {
          success: true,
          bundleId: submission.bundleId,
          tipPaidLamports: tip,
          transactionsSubmitted: transactions.length,
          attempts,
          identities: [],
        };
      }

      record.state = "failed";
      record.errorMessage = submission.errorMessage;
      recordBundleSubmission("failed", tip);

      lastError = {
        success: false,
        bundleId: submission.bundleId,
        errorMessage: submission.errorMessage ?? "Bundle failed",
        errorType: submission.errorType,
        tipPaidLamports: 0n,
        transactionsSubmitted: transactions.length,
        attempts,
        identities: [],
      };

      if (attempt === maxRetries) {
        record.state = "final_failure";
        break;
      }

      tip = minBigInt(tip + this.config.tipIncrementLamports, this.config.maxTipLamports);
      logger.warn("Bundle failed, retrying with higher tip", {
        attempt,
        error: submission.errorMessage,
        nextTipSol: lamportsToSol(tip),
      });
      try {
        await sleep(this.config.retryDelayMs, signal);
      } catch (error) {
        if (!(error instanceof OperationCancelledError)) throw error;
        logger.warn("Bundle retry cancelled", { attempts: attempts.length });
        return {
          ...lastError,
          errorMessage: "Bundle submission cancelled",
          errorType: "CANCELLED",
        };
      }
    }

    logger.error("Bundle failed after all attempts", { attempts: attempts.length });
    return lastError;
  }

  private async submitOnce(
    transactions: VersionedTransaction[],
    tip: Lamports
  ): Promise<RelaySubmission> {
    try {
      return await this.relay.submit(transactions, tip);
    } catch (error) {
      logger.error("Relay submission threw", { error: errorMessage(error) });
      return {
        success: false,
        errorMessage: errorMessage(error),
        errorType: "NETWORK_ERROR",
      };
    }
  }

  getStats(): BundleCoordinatorStats {
    return {
      totalBundles: this.totalBundles,
      successfulBundles: this.successfulBundles,
      successRate: this.totalBundles > 0 ? this.successfulBundles / this.totalBundles : 0,
      identityCount: this.pool.getCount(),
    };
  }
}
