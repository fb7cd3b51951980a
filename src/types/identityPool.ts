import type { Keypair, PublicKey, TransactionInstruction } from "@solana/web3.js";
import { z } from "zod";
import type { Lamports, TokenUnits } from "./common.js";

// ============================================================================
// Identity
// ============================================================================

export interface Identity {
  readonly index: number;
  readonly keypair: Keypair;
  readonly publicKey: PublicKey;
  /** Last observed SOL balance */
  balanceLamports: Lamports;
  /** Last observed token balance, raw units */
  tokenBalance: TokenUnits;
  totalTrades: number;
  /** Epoch ms of last participation in a landed bundle, 0 if never */
  lastUsedAt: number;
}

export interface IdentityPoolConfig {
  identityCount: number;
  minBalanceLamports: Lamports;
  targetBalanceLamports: Lamports;
  /** Headroom the funding identity keeps for transfer fees */
  feeMarginLamports: Lamports;
  /** Pause between consecutive funding transfers */
  fundingDelayMs: number;
}

export interface IdentityPoolStats {
  identityCount: number;
  totalBalanceLamports: Lamports;
  averageBalanceLamports: Lamports;
  minBalanceLamports: Lamports;
  maxBalanceLamports: Lamports;
  totalTrades: number;
}

export interface FundingOutcome {
  index: number;
  amountLamports: Lamports;
  signature: string | null;
  error?: string;
}

export interface RebalanceSummary {
  totalBalanceLamports: Lamports;
  targetTotalLamports: Lamports;
  shortfallLamports: Lamports;
  fundings: FundingOutcome[];
}

/**
 * RPC surface the pool needs. ResilientClient satisfies it.
 */
export interface IdentityPoolRpc {
  getBalance(publicKey: PublicKey): Promise<Lamports>;
  buildAndSendTransaction(
    instructions: TransactionInstruction[],
    signer: Keypair
  ): Promise<string>;
}

// ============================================================================
// Persisted State
// ============================================================================

const integerString = z.string().regex(/^\d+$/, "must be a non-negative integer string");

export const persistedIdentitySchema = z.object({
  secretKey: z.string().min(1),
  balanceLamports: integerString.default("0"),
  tokenBalance: integerString.default("0"),
  totalTrades: z.number().int().nonnegative().default(0),
  lastUsed: z.number().nonnegative().default(0),
});

export const persistedIdentityPoolSchema = z.object({
  identities: z.array(persistedIdentitySchema),
});

export type PersistedIdentity = z.infer<typeof persistedIdentitySchema>;
export type PersistedIdentityPool = z.infer<typeof persistedIdentityPoolSchema>;
