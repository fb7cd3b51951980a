/**
 * BundleRelay over the Jito Block Engine.
 *
 * Appends a tip transfer to one of Jito's tip accounts, submits the bundle
 * with endpoint failover and polls until it lands, fails or times out.
 */

import { webcrypto } from "node:crypto";
import {
  PublicKey,
  SystemProgram,
  Transaction,
  VersionedTransaction,
  type Keypair,
} from "@solana/web3.js";
import axios, { type AxiosInstance } from "axios";
import type { BundleRelay, RelayErrorType, RelaySubmission } from "../../types/bundle.js";
import { Err, Ok, type Lamports, type Result } from "../../types/common.js";
import type { JsonRpcResponse } from "../../types/rpc.js";
import { errorMessage } from "../../utils/errors.js";
import { sleep } from "../../utils/helpers.js";
import { createChildLogger } from "../../utils/logger.js";

const logger = createChildLogger({ component: "jito-relay" });

/**
 * Jito tip accounts. The tip must travel in the last transaction of the
 * bundle.
 */
export const JITO_TIP_ACCOUNTS = [
  "96gYZGLnJYVFmbjzopPSU6QiEV5fGqZNyN9nmNhvrZU5",
  "HFqU5x63VTqvQss8hp11i4wVV8bD44PvwucfZ2bU7gRe",
  "Cw8CFyM9FkoMi7K7Crf6HNQqf4uEMzpKw6QNghXLvLkY",
  "ADaUMid9yfUytqMBgopwjb2DTLSokTSzL1zt6iGPaS49",
  "DfXygSm4jCyNCybVYYK6DwvWqjKee8pbDmJGcLWNDXjh",
  "ADuUkR4vqLUMWXxW9gh6D6L8pMSawimctcNZ5pGwDcEt",
  "DttWaMuVvTiduZRnguLF7jNxTgiMBZ1hyAumKUiL2KRL",
  "3AVi9Tg9Uo68tJfuvoKvqKNWKkC5wPdSSdeBnizKZ6jT",
];

const DEFAULT_BLOCK_ENGINE_URLS = [
  "https://mainnet.block-engine.jito.wtf",
  "https://amsterdam.mainnet.block-engine.jito.wtf",
  "https://frankfurt.mainnet.block-engine.jito.wtf",
  "https://ny.mainnet.block-engine.jito.wtf",
  "https://tokyo.mainnet.block-engine.jito.wtf",
];

const BUNDLES_PATH = "/api/v1/bundles";
/** Five transactions per bundle, one of them the tip */
const MAX_USER_TRANSACTIONS = 4;
const MIN_TIP_LAMPORTS = 1_000n;

export interface JitoRelayConfig {
  blockEngineUrls: string[];
  /** Per-request timeout */
  timeoutMs: number;
  /** How long to wait for a bundle to land */
  confirmationTimeoutMs: number;
  pollIntervalMs: number;
}

const DEFAULT_CONFIG: JitoRelayConfig = {
  blockEngineUrls: DEFAULT_BLOCK_ENGINE_URLS,
  timeoutMs: 5_000,
  confirmationTimeoutMs: 30_000,
  pollIntervalMs: 1_000,
};

interface InflightBundleStatus {
  bundle_id: string;
  status: "Invalid" | "Pending" | "Failed" | "Landed";
  landed_slot?: number | null;
}

interface BundleStatus {
  bundle_id: string;
  transactions: string[];
  slot: number;
  confirmation_status: "processed" | "confirmed" | "finalized";
  err: unknown;
}

interface RpcContextValue<T> {
  context: { slot: number };
  value: T;
}

interface RelayFailure {
  type: RelayErrorType;
  message: string;
  bundleId?: string;
}

export class JitoRelay implements BundleRelay {
  private readonly config: JitoRelayConfig;
  private readonly clients = new Map<string, AxiosInstance>();
  private currentEndpointIndex = 0;
  private requestId = 0;

  constructor(
    private readonly tipPayer: Keypair,
    config: Partial<JitoRelayConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.blockEngineUrls.length === 0) {
      this.config.blockEngineUrls = DEFAULT_BLOCK_ENGINE_URLS;
    }

    logger.info("Jito relay initialized", {
      endpoints: this.config.blockEngineUrls.length,
      confirmationTimeoutMs: this.config.confirmationTimeoutMs,
    });
  }

  private client(baseURL: string): AxiosInstance {
    let client = this.clients.get(baseURL);
    if (!client) {
      client = axios.create({
        baseURL,
        timeout: this.config.timeoutMs,
        headers: { "Content-Type": "application/json" },
      });
      this.clients.set(baseURL, client);
    }
    return client;
  }

  async submit(
    transactions: VersionedTransaction[],
    tipLamports: Lamports
  ): Promise<RelaySubmission> {
    const result = await this.submitAndTrack(transactions, tipLamports);

    if (result.success) {
      return { success: true, bundleId: result.value.bundleId, landedSlot: result.value.slot };
    }
    return {
      success: false,
      bundleId: result.error.bundleId,
      errorMessage: result.error.message,
      errorType: result.error.type,
    };
  }

  private async submitAndTrack(
    transactions: VersionedTransaction[],
    tipLamports: Lamports
  ): Promise<Result<{ bundleId: string; slot?: number }, RelayFailure>> {
    if (transactions.length === 0) {
      return Err({ type: "BUNDLE_INVALID", message: "Bundle must contain at least one transaction" });
    }
    if (transactions.length > MAX_USER_TRANSACTIONS) {
      return Err({
        type: "BUNDLE_INVALID",
        message: `Bundle can contain at most ${MAX_USER_TRANSACTIONS} transactions plus the tip`,
      });
    }
    if (tipLamports < MIN_TIP_LAMPORTS) {
      return Err({
        type: "BUNDLE_INVALID",
        message: `Tip must be at least ${MIN_TIP_LAMPORTS} lamports`,
      });
    }

    // Every transaction in a bundle must share one blockhash
    const blockhash = transactions[0].message.recentBlockhash;
    if (transactions.some((tx) => tx.message.recentBlockhash !== blockhash)) {
      return Err({ type: "BUNDLE_INVALID", message: "Bundle transactions use different blockhashes" });
    }

    const tipTx = this.createTipTransaction(tipLamports, blockhash);
    if (!tipTx.success) return tipTx;

    let serialized: string[];
    try {
      serialized = [...transactions, tipTx.value].map((tx) =>
        Buffer.from(tx.serialize()).toString("base64")
      );
    } catch (error) {
      return Err({
        type: "BUNDLE_INVALID",
        message: `Failed to serialize bundle: ${errorMessage(error)}`,
      });
    }

    logger.info("Submitting Jito bundle", {
      transactionCount: transactions.length,
      tipLamports: tipLamports.toString(),
    });

    const submitted = await this.submitSerializedBundle(serialized);
    if (!submitted.success) return submitted;

    return this.trackBundleStatus(submitted.value);
  }

  private createTipTransaction(
    tipLamports: Lamports,
    blockhash: string
  ): Result<VersionedTransaction, RelayFailure> {
    try {
      const randomBytes = new Uint32Array(1);
      webcrypto.getRandomValues(randomBytes);
      const tipAccount = new PublicKey(
        JITO_TIP_ACCOUNTS[randomBytes[0] % JITO_TIP_ACCOUNTS.length]
      );

      const transaction = new Transaction().add(
        SystemProgram.transfer({
          fromPubkey: this.tipPayer.publicKey,
          toPubkey: tipAccount,
          lamports: tipLamports,
        })
      );
      transaction.recentBlockhash = blockhash;
      transaction.feePayer = this.tipPayer.publicKey;

      const versioned = new VersionedTransaction(transaction.compileMessage());
      versioned.sign([this.tipPayer]);

      return Ok(versioned);
    } catch (error) {
      logger.error("Failed to create tip transaction", { error: errorMessage(error) });
      return Err({ type: "BUNDLE_INVALID", message: "Failed to create tip transaction" });
    }
  }

  /**
   * POST sendBundle, moving to the next block engine on transport errors.
   * A JSON-RPC error from an engine is a rejection and is not retried.
   */
  private async submitSerializedBundle(
    serialized: string[]
  ): Promise<Result<string, RelayFailure>> {
    const urls = this.config.blockEngineUrls;
    let lastFailure: RelayFailure = {
      type: "NETWORK_ERROR",
      message: "Failed to submit bundle to any block engine",
    };

    for (let attempt = 0; attempt < urls.length; attempt++) {
      const endpointIndex = (this.currentEndpointIndex + attempt) % urls.length;
      const endpoint = urls[endpointIndex];

      try {
        const response = await this.client(endpoint).post<JsonRpcResponse<string>>(BUNDLES_PATH, {
          jsonrpc: "2.0",
          id: ++this.requestId,
          method: "sendBundle",
          params: [serialized, { encoding: "base64" }],
        });

        this.currentEndpointIndex = endpointIndex;

        if (response.data.error) {
          logger.error("Jito bundle submission rejected", {
            endpoint,
            errorCode: response.data.error.code,
          });
          return Err({
            type: "BUNDLE_REJECTED",
            message: `Bundle rejected: ${response.data.error.message}`,
          });
        }

        if (!response.data.result) {
          return Err({ type: "BUNDLE_REJECTED", message: "No bundle ID returned" });
        }

        logger.info("Bundle submitted", { endpoint, bundleId: response.data.result });
        return Ok(response.data.result);
      } catch (error) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        lastFailure =
          status === 429
            ? { type: "RATE_LIMITED", message: "Block engine rate limit exceeded" }
            : { type: "NETWORK_ERROR", message: `Block engine request failed: ${errorMessage(error)}` };

        logger.warn("Bundle submission failed on endpoint", {
          endpoint,
          attempt: attempt + 1,
          statusCode: status,
          error: errorMessage(error),
        });
      }
    }

    logger.error("All block engine endpoints failed");
    return Err(lastFailure);
  }

  private async trackBundleStatus(
    bundleId: string
  ): Promise<Result<{ bundleId: string; slot?: number }, RelayFailure>> {
    const startedAt = Date.now();
    const endpoint = this.config.blockEngineUrls[this.currentEndpointIndex];

    while (Date.now() - startedAt < this.config.confirmationTimeoutMs) {
      try {
        const response = await this.client(endpoint).post<
          JsonRpcResponse<RpcContextValue<InflightBundleStatus[]>>
        >(BUNDLES_PATH, {
          jsonrpc: "2.0",
          id: ++this.requestId,
          method: "getInflightBundleStatuses",
          params: [[bundleId]],
        });

        const status = response.data.result?.value[0];

        if (!status) {
          // No longer in flight; it may already have landed
          const landed = await this.getConfirmedBundleStatus(bundleId);
          if (landed !== null) return landed;
        } else if (status.status === "Landed") {
          logger.info("Jito bundle landed", {
            bundleId,
            slot: status.landed_slot,
            timeMs: Date.now() - startedAt,
          });
          return Ok({ bundleId, slot: status.landed_slot ?? undefined });
        } else if (status.status === "Invalid") {
          return Err({ type: "BUNDLE_INVALID", message: "Bundle rejected as invalid", bundleId });
        } else if (status.status === "Failed") {
          return Err({ type: "BUNDLE_FAILED", message: "Bundle execution failed", bundleId });
        }
      } catch (error) {
        logger.warn("Bundle status check failed", { bundleId, error: errorMessage(error) });
      }

      await sleep(this.config.pollIntervalMs);
    }

    logger.error("Jito bundle timeout", {
      bundleId,
      timeoutMs: this.config.confirmationTimeoutMs,
    });

    return Err({
      type: "BUNDLE_TIMEOUT",
      message: `Bundle did not land within ${this.config.confirmationTimeoutMs}ms`,
      bundleId,
    });
  }

  /** Null when the bundle is not among confirmed bundles (yet). */
  private async getConfirmedBundleStatus(
    bundleId: string
  ): Promise<Result<{ bundleId: string; slot?: number }, RelayFailure> | null> {
    const endpoint = this.config.blockEngineUrls[this.currentEndpointIndex];
    const response = await this.client(endpoint).post<
      JsonRpcResponse<RpcContextValue<(BundleStatus | null)[]>>
    >(BUNDLES_PATH, {
      jsonrpc: "2.0",
      id: ++this.requestId,
      method: "getBundleStatuses",
      params: [[bundleId]],
    });

    const status = response.data.result?.value[0];
    if (!status) return null;

    if (status.err !== null && status.err !== undefined && !isOkErr(status.err)) {
      return Err({ type: "BUNDLE_FAILED", message: "Bundle execution failed", bundleId });
    }
    return Ok({ bundleId, slot: status.slot });
  }
}

/** Jito reports success as `{ "Ok": null }`. */
function isOkErr(err: unknown): boolean {
  return typeof err === "object" && err !== null && "Ok" in err;
}
