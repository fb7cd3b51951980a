/**
 * Pool of signing identities kept funded from a single funding identity.
 */

import { Keypair, SystemProgram } from "@solana/web3.js";
import { Err, Ok, type Lamports, type Result } from "../../types/common.js";
import type {
  FundingOutcome,
  Identity,
  IdentityPoolConfig,
  IdentityPoolRpc,
  IdentityPoolStats,
  RebalanceSummary,
} from "../../types/identityPool.js";
import { IdentityPoolError, ValidationError, errorMessage, toError } from "../../utils/errors.js";
import { lamportsToSol, sleep, truncateAddress } from "../../utils/helpers.js";
import { createChildLogger } from "../../utils/logger.js";
import { recordIdentityFunding } from "../../utils/metrics.js";
import type { IdentityStore } from "./identityStore.js";

const logger = createChildLogger({ component: "identity-pool" });

const DEFAULT_CONFIG: IdentityPoolConfig = {
  identityCount: 20,
  minBalanceLamports: 100_000_000n,
  targetBalanceLamports: 1_000_000_000n,
  feeMarginLamports: 10_000_000n,
  fundingDelayMs: 100,
};

export class IdentityPool {
  private readonly config: IdentityPoolConfig;
  private identities: Identity[] = [];
  private fundingIdentity: Keypair | null = null;
  private initialized = false;

  constructor(
    private readonly rpc: IdentityPoolRpc,
    config: Partial<IdentityPoolConfig> = {},
    private readonly store: IdentityStore | null = null
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (this.config.identityCount < 1) {
      throw new ValidationError("identityCount must be at least 1");
    }
    if (this.config.targetBalanceLamports < this.config.minBalanceLamports) {
      throw new ValidationError("targetBalanceLamports must be >= minBalanceLamports");
    }
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Load or generate identities, then top up every identity below the
   * minimum. No-op on a second call.
   */
  async initialize(fundingIdentity: Keypair): Promise<void> {
    if (this.initialized) {
      logger.warn("Identity pool already initialized");
      return;
    }
    this.fundingIdentity = fundingIdentity;

    const stored = this.store ? await this.store.load() : null;
    const base = stored ?? [];

    this.identities = base.map((identity, index) => ({ ...identity, index }));
    while (this.identities.length < this.config.identityCount) {
      this.identities.push(this.generateIdentity(this.identities.length));
    }

    logger.info("Identities ready", {
      loaded: base.length,
      generated: this.identities.length - base.length,
    });

    await this.persist();
    await this.topUpBelowMinimum();
    await this.persist();

    this.initialized = true;
    logger.info("Identity pool initialized", { count: this.identities.length });
  }

  private generateIdentity(index: number): Identity {
    const keypair = Keypair.generate();
    return {
      index,
      keypair,
      publicKey: keypair.publicKey,
      balanceLamports: 0n,
      tokenBalance: 0n,
      totalTrades: 0,
      lastUsedAt: 0,
    };
  }

  private async topUpBelowMinimum(): Promise<void> {
    const needs: Array<{ index: number; amount: Lamports }> = [];

    for (const identity of this.identities) {
      const balance = await this.refreshBalance(identity);
      if (balance === null) continue;

      if (balance < this.config.minBalanceLamports) {
        needs.push({
          index: identity.index,
          amount: this.config.targetBalanceLamports - balance,
        });
      }
    }

    if (needs.length === 0) {
      logger.info("All identities at or above minimum balance");
      return;
    }

    const totalNeeded = needs.reduce((sum, need) => sum + need.amount, 0n);
    const funder = this.requireFundingIdentity();

    let funderBalance: Lamports;
    try {
      funderBalance = await this.rpc.getBalance(funder.publicKey);
    } catch (error) {
      logger.warn("Could not read funding identity balance, skipping funding", {
        error: errorMessage(error),
      });
      return;
    }

    if (funderBalance < totalNeeded + this.config.feeMarginLamports) {
      logger.warn("Insufficient funding balance, skipping funding", {
        neededSol: lamportsToSol(totalNeeded),
        availableSol: lamportsToSol(funderBalance),
        identitiesBelowMinimum: needs.length,
      });
      return;
    }

    logger.info("Funding identities below minimum", {
      count: needs.length,
      totalSol: lamportsToSol(totalNeeded),
    });

    for (const [position, need] of needs.entries()) {
      await this.fund(need.index, need.amount);
      if (position < needs.length - 1) {
        await sleep(this.config.fundingDelayMs);
      }
    }
  }

  /** Balance refresh that leaves the cached value alone when the read fails. */
  private async refreshBalance(identity: Identity): Promise<Lamports | null> {
    try {
      identity.balanceLamports = await this.rpc.getBalance(identity.publicKey);
      return identity.balanceLamports;
    } catch (error) {
      logger.warn("Balance read failed, skipping identity", {
        index: identity.index,
        error: errorMessage(error),
      });
      return null;
    }
  }

  private requireFundingIdentity(): Keypair {
    if (!this.fundingIdentity) {
      throw new IdentityPoolError("Funding identity is not set; call initialize() first");
    }
    return this.fundingIdentity;
  }

  private async persist(): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.save(this.identities);
    } catch (error) {
      logger.error("Failed to persist identities", { error: errorMessage(error) });
    }
  }

  // ==========================================================================
  // Funding
  // ==========================================================================

  /**
   * Transfer `amountLamports` from the funding identity. Transfer failures
   * come back as Err; nothing is thrown for them.
   */
  async fund(index: number, amountLamports: Lamports): Promise<Result<string, IdentityPoolError>> {
    const identity = this.getIdentity(index);

    if (amountLamports <= 0n) {
      return Err(new IdentityPoolError(`Funding amount must be positive, got ${amountLamports}`));
    }

    if (!this.fundingIdentity) {
      return Err(new IdentityPoolError("Funding identity is not set; call initialize() first"));
    }
    const funder = this.fundingIdentity;

    try {
      const signature = await this.rpc.buildAndSendTransaction(
        [
          SystemProgram.transfer({
            fromPubkey: funder.publicKey,
            toPubkey: identity.publicKey,
            lamports: amountLamports,
          }),
        ],
        funder
      );

      identity.balanceLamports += amountLamports;
      recordIdentityFunding("success");

      logger.info("Funded identity", {
        index,
        address: truncateAddress(identity.publicKey.toBase58()),
        amountSol: lamportsToSol(amountLamports),
        signature,
      });

      return Ok(signature);
    } catch (error) {
      recordIdentityFunding("failed");
      logger.error("Failed to fund identity", { index, error: errorMessage(error) });
      return Err(new IdentityPoolError(`Failed to fund identity ${index}`, toError(error)));
    }
  }

  /**
   * Bring the pool total back to target * N by splitting the shortfall
   * evenly across identities currently under target.
   */
  async rebalance(): Promise<RebalanceSummary> {
    let totalBalance = 0n;
    for (const identity of this.identities) {
      await this.refreshBalance(identity);
      totalBalance += identity.balanceLamports;
    }

    const targetTotal = this.config.targetBalanceLamports * BigInt(this.identities.length);
    const shortfall = targetTotal - totalBalance;
    const fundings: FundingOutcome[] = [];

    if (shortfall <= 0n) {
      logger.info("Identity pool at or above target", {
        totalSol: lamportsToSol(totalBalance),
      });
      return {
        totalBalanceLamports: totalBalance,
        targetTotalLamports: targetTotal,
        shortfallLamports: 0n,
        fundings,
      };
    }

    const underTarget = this.identities.filter(
      (identity) => identity.balanceLamports < this.config.targetBalanceLamports
    );
    const perIdentity = underTarget.length > 0 ? shortfall / BigInt(underTarget.length) : 0n;

    logger.info("Rebalancing identity pool", {
      shortfallSol: lamportsToSol(shortfall),
      recipients: underTarget.length,
      perIdentitySol: lamportsToSol(perIdentity),
    });

    if (perIdentity > 0n) {
      for (const [position, identity] of underTarget.entries()) {
        const result = await this.fund(identity.index, perIdentity);
        fundings.push(
          result.success
            ? { index: identity.index, amountLamports: perIdentity, signature: result.value }
            : {
                index: identity.index,
                amountLamports: perIdentity,
                signature: null,
                error: result.error.message,
              }
        );
        if (position < underTarget.length - 1) {
          await sleep(this.config.fundingDelayMs);
        }
      }
      await this.persist();
    }

    return {
      totalBalanceLamports: totalBalance,
      targetTotalLamports: targetTotal,
      shortfallLamports: shortfall,
      fundings,
    };
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  /**
   * @throws {ValidationError} when `index` is outside [0, count)
   */
  getIdentity(index: number): Identity {
    const identity = Number.isInteger(index) ? this.identities[index] : undefined;
    if (!identity) {
      throw new ValidationError(
        `Identity index ${index} out of range (pool has ${this.identities.length})`
      );
    }
    return identity;
  }

  getCount(): number {
    return this.identities.length;
  }

  /**
   * Refresh and return every identity's balance, in index order.
   */
  async getAllBalances(): Promise<Lamports[]> {
    const balances: Lamports[] = [];
    for (const identity of this.identities) {
      await this.refreshBalance(identity);
      balances.push(identity.balanceLamports);
    }
    return balances;
  }

  /**
   * Mark an identity as having taken part in a landed bundle.
   */
  recordUsage(index: number, now: number = Date.now()): void {
    const identity = this.getIdentity(index);
    identity.totalTrades++;
    identity.lastUsedAt = now;
  }

  getStats(): IdentityPoolStats {
    const balances = this.identities.map((identity) => identity.balanceLamports);
    const total = balances.reduce((sum, value) => sum + value, 0n);
    const count = BigInt(balances.length);
    const first = balances.length > 0 ? balances[0] : 0n;

    return {
      identityCount: this.identities.length,
      totalBalanceLamports: total,
      averageBalanceLamports: count > 0n ? total / count : 0n,
      minBalanceLamports: balances.reduce((min, value) => (value < min ? value : min), first),
      maxBalanceLamports: balances.reduce((max, value) => (value > max ? value : max), first),
      totalTrades: this.identities.reduce((sum, identity) => sum + identity.totalTrades, 0),
    };
  }
}
