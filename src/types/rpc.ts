/**
 * RPC layer types: provider health, JSON-RPC envelopes and the narrow
 * connection surface the router and client depend on.
 */

import type {
  AccountInfo,
  BlockhashWithExpiryBlockHeight,
  Commitment,
  PublicKey,
  RpcResponseAndContext,
  SendOptions,
  SignatureStatus,
  SignatureStatusConfig,
  TokenAmount,
  TransactionSignature,
  VersionedTransaction,
} from "@solana/web3.js";

// ============================================================================
// Provider Health
// ============================================================================

export type ProviderStatus = "healthy" | "degraded" | "unhealthy" | "unknown";

export interface ProviderHealthSnapshot {
  endpoint: string;
  status: ProviderStatus;
  avgLatencyMs: number;
  successRate: number;
  consecutiveFailures: number;
  totalRequests: number;
  successfulRequests: number;
  score: number;
  lastError: string | null;
  lastCheckAt: number | null;
}

export type HealthSummary = Record<string, Omit<ProviderHealthSnapshot, "endpoint">>;

// ============================================================================
// Connection Surface
// ============================================================================

/**
 * Subset of @solana/web3.js `Connection` used here. A real Connection
 * satisfies it; tests pass in-process fakes.
 */
export interface RpcConnection {
  getLatestBlockhash(commitment?: Commitment): Promise<BlockhashWithExpiryBlockHeight>;
  getBalance(publicKey: PublicKey, commitment?: Commitment): Promise<number>;
  getAccountInfo(
    publicKey: PublicKey,
    commitment?: Commitment
  ): Promise<AccountInfo<Buffer> | null>;
  getMultipleAccountsInfo(
    publicKeys: PublicKey[],
    commitment?: Commitment
  ): Promise<(AccountInfo<Buffer> | null)[]>;
  getTokenAccountBalance(
    tokenAddress: PublicKey,
    commitment?: Commitment
  ): Promise<RpcResponseAndContext<TokenAmount>>;
  sendRawTransaction(
    rawTransaction: Buffer | Uint8Array | number[],
    options?: SendOptions
  ): Promise<TransactionSignature>;
  getSignatureStatus(
    signature: TransactionSignature,
    config?: SignatureStatusConfig
  ): Promise<RpcResponseAndContext<SignatureStatus | null>>;
}

export type ConnectionFactory = (endpoint: string, commitment: Commitment) => RpcConnection;

/** Operation executed against whichever provider is current for the attempt. */
export type RpcOperation<T> = (connection: RpcConnection, endpoint: string) => Promise<T>;

// ============================================================================
// JSON-RPC
// ============================================================================

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: number | string;
  method: string;
  params?: unknown[];
}

export interface JsonRpcResponse<T = unknown> {
  jsonrpc: "2.0";
  id: number | string | null;
  result?: T;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export interface HttpResponse<T> {
  status: number;
  data: T;
}

export interface PostOptions {
  timeoutMs?: number;
  /** Aborts the request; the call rejects with OperationCancelledError */
  signal?: AbortSignal;
}

/**
 * POST transport for raw JSON-RPC calls (liveness checks, `postRpc`).
 */
export interface JsonRpcTransport {
  post<T>(url: string, body: unknown, options?: PostOptions): Promise<HttpResponse<T>>;
  close(): Promise<void>;
}

// ============================================================================
// Router
// ============================================================================

export interface FailoverRouterConfig {
  healthCheckIntervalMs: number;
  blockhashRefreshIntervalMs: number;
  healthCheckTimeoutMs: number;
  rpcTimeoutMs: number;
  minSuccessRate: number;
  maxLatencyMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  confirmPollIntervalMs: number;
  commitment: Commitment;
}

export interface FailoverOptions {
  maxRetries?: number;
  /** Method name for logs and metrics */
  label?: string;
}

export interface CachedBlockhash extends BlockhashWithExpiryBlockHeight {
  fetchedAt: number;
}

/**
 * Multi-provider routing as seen by ResilientClient. FailoverRouter is the
 * production implementation.
 */
export interface FailoverStrategy {
  start(): Promise<void>;
  stop(): Promise<void>;
  executeWithFailover<T>(operation: RpcOperation<T>, options?: FailoverOptions): Promise<T>;
  getCachedBlockhash(): Promise<CachedBlockhash>;
  getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight>;
  sendTransaction(transaction: VersionedTransaction, options?: SendOptions): Promise<string>;
  confirmTransaction(signature: string, commitment?: Commitment): Promise<boolean>;
  postRpc<T>(body: JsonRpcRequest): Promise<JsonRpcResponse<T>>;
  getHealthSummary(): HealthSummary;
}
