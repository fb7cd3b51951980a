/**
 * Solana client facade used by the identity pool and bundle coordinator.
 *
 * Runs in one of two modes chosen at construction:
 * - single: one endpoint, its own blockhash cache and refresh loop
 * - failover: every call goes through an injected FailoverStrategy
 */

import {
  TransactionMessage,
  VersionedTransaction,
  type AccountInfo,
  type BlockhashWithExpiryBlockHeight,
  type Commitment,
  type Keypair,
  type PublicKey,
  type TransactionInstruction,
} from "@solana/web3.js";
import type {
  CachedBlockhash,
  ConnectionFactory,
  FailoverStrategy,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcTransport,
  RpcConnection,
  RpcOperation,
} from "../../types/rpc.js";
import { Err, Ok, type Lamports, type Result, type TokenUnits } from "../../types/common.js";
import {
  AppError,
  HttpStatusError,
  NotFoundError,
  TransactionBuildError,
  TransactionSubmitError,
  errorMessage,
  toError,
} from "../../utils/errors.js";
import { abortable, redactEndpoint } from "../../utils/helpers.js";
import { startBackgroundLoop, type BackgroundLoop } from "../../utils/intervals.js";
import { AsyncLock } from "../../utils/lock.js";
import { createChildLogger } from "../../utils/logger.js";
import { recordRpcRequest } from "../../utils/metrics.js";
import { retryWithBackoff } from "../../utils/retry.js";
import { buildComputeBudgetInstructions, type ComputeBudgetOptions } from "./computeBudget.js";
import { waitForConfirmation } from "./confirmation.js";
import { createConnection } from "./connection.js";

const logger = createChildLogger({ component: "resilient-client" });

// ============================================================================
// Configuration
// ============================================================================

export interface ResilientClientConfig {
  commitment: Commitment;
  blockhashRefreshIntervalMs: number;
  /** Timeout for raw JSON-RPC POSTs in single mode */
  rpcTimeoutMs: number;
  sendMaxRetries: number;
  /** Wait between send attempts is this * 2^attempt */
  sendRetryBaseDelayMs: number;
  sendRetryMaxDelayMs: number;
  /** Fraction of each send retry wait randomized in either direction */
  sendRetryJitterFactor: number;
  confirmPollIntervalMs: number;
}

const DEFAULT_CONFIG: ResilientClientConfig = {
  commitment: "confirmed",
  blockhashRefreshIntervalMs: 5_000,
  rpcTimeoutMs: 10_000,
  sendMaxRetries: 3,
  sendRetryBaseDelayMs: 1_000,
  sendRetryMaxDelayMs: 10_000,
  sendRetryJitterFactor: 0.1,
  confirmPollIntervalMs: 1_000,
};

export type ResilientClientOptions =
  | {
      mode: "single";
      endpoint: string;
      transport: JsonRpcTransport;
      connectionFactory?: ConnectionFactory;
      config?: Partial<ResilientClientConfig>;
    }
  | {
      mode: "failover";
      strategy: FailoverStrategy;
      config?: Partial<ResilientClientConfig>;
    };

export interface BuildTransactionOptions extends ComputeBudgetOptions {
  /** Co-signers beyond the fee payer */
  additionalSigners?: Keypair[];
}

export interface SendTransactionOptions {
  skipPreflight?: boolean;
  maxRetries?: number;
}

interface SingleEndpoint {
  endpoint: string;
  label: string;
  connection: RpcConnection;
  transport: JsonRpcTransport;
}

// ============================================================================
// Client
// ============================================================================

export class ResilientClient {
  private readonly config: ResilientClientConfig;
  private readonly strategy: FailoverStrategy | null;
  private readonly single: SingleEndpoint | null;

  // Single mode only; failover mode shares the router's cache
  private cachedBlockhash: CachedBlockhash | null = null;
  private readonly blockhashLock = new AsyncLock();
  private blockhashLoop: BackgroundLoop | null = null;
  private lifecycle: AbortController | null = null;

  constructor(options: ResilientClientOptions) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };

    if (options.mode === "failover") {
      this.strategy = options.strategy;
      this.single = null;
    } else {
      const factory = options.connectionFactory ?? createConnection;
      this.strategy = null;
      this.single = {
        endpoint: options.endpoint,
        label: redactEndpoint(options.endpoint),
        connection: factory(options.endpoint, this.config.commitment),
        transport: options.transport,
      };
    }
  }

  get mode(): "single" | "failover" {
    return this.strategy ? "failover" : "single";
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async start(): Promise<void> {
    if (this.lifecycle) return;
    this.lifecycle = new AbortController();

    if (this.strategy) {
      await this.strategy.start();
    } else {
      this.blockhashLoop = startBackgroundLoop(
        (signal) => this.refreshBlockhash(signal),
        this.config.blockhashRefreshIntervalMs,
        "client-blockhash-refresh",
        { runImmediately: true }
      );
    }

    logger.info("Resilient client started", { mode: this.mode });
  }

  async stop(): Promise<void> {
    if (!this.lifecycle) return;
    this.lifecycle.abort();
    this.lifecycle = null;

    if (this.strategy) {
      await this.strategy.stop();
    } else if (this.blockhashLoop) {
      await this.blockhashLoop.stop();
      this.blockhashLoop = null;
    }

    logger.info("Resilient client stopped", { mode: this.mode });
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private async execute<T>(operation: RpcOperation<T>, method: string): Promise<T> {
    if (this.strategy) {
      return this.strategy.executeWithFailover(operation, { label: method });
    }

    const single = this.requireSingle();
    const startedAt = Date.now();
    try {
      const result = await operation(single.connection, single.endpoint);
      recordRpcRequest(single.label, method, Date.now() - startedAt, "success");
      return result;
    } catch (error) {
      recordRpcRequest(single.label, method, Date.now() - startedAt, "error");
      throw error;
    }
  }

  private requireSingle(): SingleEndpoint {
    if (!this.single) {
      throw new AppError("Client is not in single-endpoint mode", "INVALID_MODE", 500, false);
    }
    return this.single;
  }

  // ==========================================================================
  // Blockhash
  // ==========================================================================

  async getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight> {
    if (this.strategy) {
      return this.strategy.getLatestBlockhash();
    }
    return this.execute(
      (connection) => connection.getLatestBlockhash("processed"),
      "getLatestBlockhash"
    );
  }

  /**
   * Most recently cached blockhash; fetched once when nothing is cached.
   */
  async getCachedBlockhash(): Promise<CachedBlockhash> {
    if (this.strategy) {
      return this.strategy.getCachedBlockhash();
    }

    return this.blockhashLock.runExclusive(async () => {
      if (this.cachedBlockhash) return this.cachedBlockhash;

      const fresh = await this.getLatestBlockhash();
      const cached: CachedBlockhash = { ...fresh, fetchedAt: Date.now() };
      this.cachedBlockhash = cached;
      return cached;
    });
  }

  private async refreshBlockhash(signal: AbortSignal): Promise<void> {
    try {
      const fresh = await abortable(this.getLatestBlockhash(), signal);
      await this.blockhashLock.runExclusive(() => {
        this.cachedBlockhash = { ...fresh, fetchedAt: Date.now() };
      });
    } catch (error) {
      if (signal.aborted) return;
      logger.warn("Blockhash fetch failed", { error: errorMessage(error) });
    }
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  /**
   * Sign a v0 transaction over the cached blockhash. With any budget option
   * set, the data size limit, unit limit and unit price instructions come
   * first, in that order; caller instructions follow unchanged.
   */
  async buildTransaction(
    instructions: TransactionInstruction[],
    signer: Keypair,
    options: BuildTransactionOptions = {}
  ): Promise<VersionedTransaction> {
    let recentBlockhash: string;
    try {
      recentBlockhash = (await this.getCachedBlockhash()).blockhash;
    } catch (error) {
      throw new TransactionBuildError("Unable to obtain a recent blockhash", toError(error));
    }

    try {
      const message = new TransactionMessage({
        payerKey: signer.publicKey,
        recentBlockhash,
        instructions: [...buildComputeBudgetInstructions(options), ...instructions],
      }).compileToV0Message();

      const transaction = new VersionedTransaction(message);
      transaction.sign([signer, ...(options.additionalSigners ?? [])]);
      return transaction;
    } catch (error) {
      throw new TransactionBuildError(
        `Failed to build transaction: ${errorMessage(error)}`,
        toError(error)
      );
    }
  }

  /**
   * Submit with up to `maxRetries` attempts, waiting base * 2^attempt between
   * them. In failover mode each attempt is itself routed across providers.
   */
  async sendTransaction(
    transaction: VersionedTransaction,
    options: SendTransactionOptions = {}
  ): Promise<string> {
    const skipPreflight = options.skipPreflight ?? true;
    const maxRetries = options.maxRetries ?? this.config.sendMaxRetries;
    const sendOptions = {
      skipPreflight,
      preflightCommitment: "processed" as const,
    };

    const result = await retryWithBackoff(
      () =>
        this.strategy
          ? this.strategy.sendTransaction(transaction, sendOptions)
          : this.execute(
              (connection) => connection.sendRawTransaction(transaction.serialize(), sendOptions),
              "sendTransaction"
            ),
      {
        maxRetries,
        baseDelayMs: this.config.sendRetryBaseDelayMs,
        maxDelayMs: this.config.sendRetryMaxDelayMs,
        jitterFactor: this.config.sendRetryJitterFactor,
        operationName: "send_transaction",
        signal: this.lifecycle?.signal,
        onRetry: (error, attempt, delayMs) =>
          logger.warn("Transaction send failed, retrying", {
            attempt,
            delayMs,
            error: error.message,
          }),
      }
    );

    if (!result.success) {
      throw new TransactionSubmitError(
        result.error.message,
        result.error.attempts,
        result.error.originalError
      );
    }

    return result.value.value;
  }

  async buildAndSendTransaction(
    instructions: TransactionInstruction[],
    signer: Keypair,
    options: BuildTransactionOptions & SendTransactionOptions = {}
  ): Promise<string> {
    const transaction = await this.buildTransaction(instructions, signer, options);
    const signature = await this.sendTransaction(transaction, options);

    logger.info("Transaction sent", {
      signature,
      priorityFeeMicroLamports: options.priorityFeeMicroLamports ?? 0,
    });

    return signature;
  }

  /**
   * Poll until `commitment` is reached. Returns false instead of throwing.
   */
  async confirmTransaction(
    signature: string,
    commitment: Commitment = this.config.commitment
  ): Promise<boolean> {
    if (this.strategy) {
      return this.strategy.confirmTransaction(signature, commitment);
    }

    try {
      await this.execute(
        (connection) =>
          waitForConfirmation(connection, signature, commitment, {
            pollIntervalMs: this.config.confirmPollIntervalMs,
            signal: this.lifecycle?.signal,
          }),
        "confirmTransaction"
      );
      return true;
    } catch (error) {
      logger.warn("Transaction confirmation failed", {
        signature,
        error: errorMessage(error),
      });
      return false;
    }
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async getBalance(publicKey: PublicKey): Promise<Lamports> {
    const lamports = await this.execute(
      (connection) => connection.getBalance(publicKey, this.config.commitment),
      "getBalance"
    );
    return BigInt(lamports);
  }

  async getTokenAccountBalance(tokenAccount: PublicKey): Promise<TokenUnits> {
    const response = await this.execute(
      (connection) => connection.getTokenAccountBalance(tokenAccount, this.config.commitment),
      "getTokenAccountBalance"
    );
    return BigInt(response.value.amount);
  }

  /**
   * @throws {NotFoundError} when the account does not exist
   */
  async getAccountInfo(publicKey: PublicKey): Promise<AccountInfo<Buffer>> {
    const info = await this.execute(
      (connection) => connection.getAccountInfo(publicKey, this.config.commitment),
      "getAccountInfo"
    );
    if (!info) {
      throw new NotFoundError(`Account ${publicKey.toBase58()}`);
    }
    return info;
  }

  async getMultipleAccounts(publicKeys: PublicKey[]): Promise<(AccountInfo<Buffer> | null)[]> {
    if (publicKeys.length === 0) return [];
    return this.execute(
      (connection) => connection.getMultipleAccountsInfo(publicKeys, this.config.commitment),
      "getMultipleAccounts"
    );
  }

  // ==========================================================================
  // Raw JSON-RPC
  // ==========================================================================

  async postRpc<T>(body: JsonRpcRequest): Promise<Result<JsonRpcResponse<T>, AppError>> {
    try {
      if (this.strategy) {
        return Ok(await this.strategy.postRpc<T>(body));
      }

      const single = this.requireSingle();
      const response = await single.transport.post<JsonRpcResponse<T>>(single.endpoint, body, {
        timeoutMs: this.config.rpcTimeoutMs,
      });
      if (response.status < 200 || response.status >= 300) {
        throw new HttpStatusError(response.status);
      }
      return Ok(response.data);
    } catch (error) {
      logger.warn("Raw RPC call failed", { method: body.method, error: errorMessage(error) });
      return Err(
        error instanceof AppError
          ? error
          : new AppError(errorMessage(error), "RPC_ERROR", 502, true, toError(error))
      );
    }
  }

  /**
   * Node health as reported by `getHealth`; null when unavailable.
   */
  async getHealth(): Promise<string | null> {
    const result = await this.postRpc<string>({ jsonrpc: "2.0", id: 1, method: "getHealth" });
    if (!result.success) return null;
    return result.value.result ?? null;
  }
}
