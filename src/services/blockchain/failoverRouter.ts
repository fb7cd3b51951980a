/**
 * Multi-provider RPC router.
 *
 * Health-scores every configured endpoint, keeps one as "current" and retries
 * failed calls across providers. Two background loops run between start()
 * and stop(): periodic liveness checks and blockhash refresh.
 */

import type {
  BlockhashWithExpiryBlockHeight,
  Commitment,
  SendOptions,
  VersionedTransaction,
} from "@solana/web3.js";
import type {
  CachedBlockhash,
  ConnectionFactory,
  FailoverOptions,
  FailoverRouterConfig,
  FailoverStrategy,
  HealthSummary,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcTransport,
  RpcConnection,
  RpcOperation,
} from "../../types/rpc.js";
import {
  AllProvidersExhaustedError,
  ConstructionError,
  HttpStatusError,
  ProviderUnavailableError,
  RequestTimeoutError,
  errorMessage,
  toError,
} from "../../utils/errors.js";
import { abortable, redactEndpoint, sleep } from "../../utils/helpers.js";
import { startBackgroundLoop, type BackgroundLoop } from "../../utils/intervals.js";
import { AsyncLock } from "../../utils/lock.js";
import { createChildLogger } from "../../utils/logger.js";
import {
  recordFailoverExhausted,
  recordProviderSwitch,
  recordRpcRequest,
  setProviderScore,
} from "../../utils/metrics.js";
import { waitForConfirmation } from "./confirmation.js";
import { createConnection } from "./connection.js";
import { ProviderHealthTracker } from "./providerHealth.js";

const logger = createChildLogger({ component: "failover-router" });

const DEFAULT_CONFIG: FailoverRouterConfig = {
  healthCheckIntervalMs: 30_000,
  blockhashRefreshIntervalMs: 5_000,
  healthCheckTimeoutMs: 5_000,
  rpcTimeoutMs: 10_000,
  minSuccessRate: 0.8,
  maxLatencyMs: 2_000,
  maxRetries: 3,
  backoffBaseMs: 500,
  confirmPollIntervalMs: 1_000,
  commitment: "confirmed",
};

const CONFIRM_MAX_RETRIES = 5;
const BLOCKHASH_COMMITMENT: Commitment = "processed";

export interface FailoverRouterDeps {
  transport: JsonRpcTransport;
  connectionFactory?: ConnectionFactory;
}

interface ProviderEntry {
  readonly endpoint: string;
  /** Redacted form for logs and metric labels */
  readonly label: string;
  readonly health: ProviderHealthTracker;
  connection: RpcConnection | null;
}

export class FailoverRouter implements FailoverStrategy {
  private readonly config: FailoverRouterConfig;
  private readonly providers: readonly ProviderEntry[];
  private readonly transport: JsonRpcTransport;
  private readonly connectionFactory: ConnectionFactory;

  // Read without the lock on dispatch, written only under it
  private currentProvider: ProviderEntry | null = null;
  private readonly selectionLock = new AsyncLock();

  private cachedBlockhash: CachedBlockhash | null = null;
  private readonly blockhashLock = new AsyncLock();

  private loops: BackgroundLoop[] = [];
  private lifecycle: AbortController | null = null;

  constructor(
    endpoints: readonly string[],
    deps: FailoverRouterDeps,
    config: Partial<FailoverRouterConfig> = {}
  ) {
    if (endpoints.length === 0) {
      throw new ConstructionError("At least one RPC provider is required");
    }

    this.config = { ...DEFAULT_CONFIG, ...config };
    this.transport = deps.transport;
    this.connectionFactory = deps.connectionFactory ?? createConnection;
    this.providers = endpoints.map((endpoint) => ({
      endpoint,
      label: redactEndpoint(endpoint),
      health: new ProviderHealthTracker(endpoint),
      connection: null,
    }));

    logger.info("Failover router created", {
      providers: this.providers.map((p) => p.label),
      healthCheckIntervalMs: this.config.healthCheckIntervalMs,
      minSuccessRate: this.config.minSuccessRate,
      maxLatencyMs: this.config.maxLatencyMs,
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get isRunning(): boolean {
    return this.lifecycle !== null;
  }

  /**
   * Check every provider, pick the best one, then launch the health-check
   * and blockhash-refresh loops. No-op when already running.
   */
  async start(): Promise<void> {
    if (this.lifecycle) return;
    this.lifecycle = new AbortController();

    await this.runHealthChecks(this.lifecycle.signal);
    const current = await this.selectBest();

    this.loops = [
      startBackgroundLoop(
        async (signal) => {
          await this.runHealthChecks(signal);
          await this.selectBest();
        },
        this.config.healthCheckIntervalMs,
        "rpc-health-check"
      ),
      startBackgroundLoop(
        (signal) => this.refreshBlockhash(signal),
        this.config.blockhashRefreshIntervalMs,
        "rpc-blockhash-refresh",
        { runImmediately: true }
      ),
    ];

    logger.info("Failover router started", {
      current: redactEndpoint(current),
      providers: this.providers.length,
    });
  }

  /**
   * Cancel both loops and any backoff or confirmation wait in flight.
   */
  async stop(): Promise<void> {
    if (!this.lifecycle) return;

    this.lifecycle.abort();
    await Promise.all(this.loops.map((loop) => loop.stop()));
    this.loops = [];
    this.lifecycle = null;

    for (const provider of this.providers) {
      provider.connection = null;
    }

    logger.info("Failover router stopped");
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  getCurrentProvider(): string | null {
    return this.currentProvider?.endpoint ?? null;
  }

  /**
   * Choose the best provider, switching the current one if the winner
   * differs. Providers in `exclude` are skipped unless that leaves nothing.
   */
  async selectBest(exclude?: ReadonlySet<string>): Promise<string> {
    const entry = await this.selectionLock.runExclusive(() => this.pickBest(exclude));
    return entry.endpoint;
  }

  private pickBest(exclude?: ReadonlySet<string>): ProviderEntry {
    let candidates = this.providers.filter((p) => !exclude?.has(p.endpoint));
    if (candidates.length === 0) {
      candidates = [...this.providers];
    }

    const eligible = candidates.filter((p) => {
      const status = p.health.getStatus();
      return (
        (status === "healthy" || status === "degraded") &&
        p.health.successRate >= this.config.minSuccessRate &&
        p.health.getAverageLatencyMs() <= this.config.maxLatencyMs
      );
    });

    const pool = eligible.length > 0 ? eligible : candidates;

    // Strict comparison keeps configuration order on ties
    let best = pool[0];
    for (const provider of pool) {
      if (provider.health.score() > best.health.score()) {
        best = provider;
      }
    }

    if (best !== this.currentProvider) {
      const previous = this.currentProvider;
      this.currentProvider = best;

      logger.info("Switched RPC provider", {
        from: previous?.label ?? null,
        to: best.label,
        score: best.health.score(),
        status: best.health.getStatus(),
      });

      recordProviderSwitch(previous?.label ?? "none", best.label);
    }

    return best;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run `operation` against the current provider, failing over to others on
   * error. Throws AllProvidersExhaustedError after `maxRetries` attempts.
   */
  async executeWithFailover<T>(
    operation: RpcOperation<T>,
    options: FailoverOptions = {}
  ): Promise<T> {
    const maxRetries = options.maxRetries ?? this.config.maxRetries;
    const method = options.label ?? "rpc";
    const attempted = new Set<string>();
    let lastError: Error | undefined;
    let lastEndpoint: string | null = null;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      if (attempted.size >= this.providers.length) {
        attempted.clear();
      }

      let provider =
        this.currentProvider ??
        (await this.selectionLock.runExclusive(() => this.pickBest()));
      if (attempted.has(provider.endpoint)) {
        provider = await this.selectionLock.runExclusive(() => this.pickBest(attempted));
      }
      attempted.add(provider.endpoint);

      const startedAt = Date.now();
      try {
        const result = await operation(this.getConnection(provider), provider.endpoint);
        const latencyMs = Date.now() - startedAt;

        provider.health.recordSuccess(latencyMs);
        recordRpcRequest(provider.label, method, latencyMs, "success");
        setProviderScore(provider.label, provider.health.score());

        return result;
      } catch (error) {
        lastError = toError(error);
        lastEndpoint = provider.endpoint;

        provider.health.recordFailure(lastError);
        recordRpcRequest(provider.label, method, Date.now() - startedAt, "error");
        setProviderScore(provider.label, provider.health.score());

        logger.warn("RPC call failed, failing over", {
          method,
          endpoint: provider.label,
          attempt: attempt + 1,
          maxRetries,
          error: lastError.message,
        });

        await this.selectBest();

        if (attempt < maxRetries - 1) {
          await sleep(this.config.backoffBaseMs * 2 ** attempt, this.lifecycle?.signal);
        }
      }
    }

    recordFailoverExhausted(method);
    logger.error("All RPC providers failed", {
      method,
      attempts: maxRetries,
      lastEndpoint: lastEndpoint ? redactEndpoint(lastEndpoint) : null,
      error: lastError?.message,
    });

    throw new AllProvidersExhaustedError(maxRetries, lastEndpoint, lastError);
  }

  private getConnection(provider: ProviderEntry): RpcConnection {
    if (!provider.connection) {
      provider.connection = this.connectionFactory(provider.endpoint, this.config.commitment);
    }
    return provider.connection;
  }

  // ==========================================================================
  // RPC wrappers
  // ==========================================================================

  async getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight> {
    return this.executeWithFailover(
      (connection) => connection.getLatestBlockhash(BLOCKHASH_COMMITMENT),
      { label: "getLatestBlockhash" }
    );
  }

  /**
   * Shared cached blockhash; fetched once under the lock when empty.
   */
  async getCachedBlockhash(): Promise<CachedBlockhash> {
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
      logger.warn("Blockhash refresh failed", { error: errorMessage(error) });
    }
  }

  async sendTransaction(
    transaction: VersionedTransaction,
    options: SendOptions = {}
  ): Promise<string> {
    const raw = transaction.serialize();
    return this.executeWithFailover(
      (connection) => connection.sendRawTransaction(raw, options),
      { label: "sendTransaction" }
    );
  }

  /**
   * Poll until `commitment` is reached. Returns false instead of throwing.
   */
  async confirmTransaction(
    signature: string,
    commitment: Commitment = this.config.commitment
  ): Promise<boolean> {
    try {
      await this.executeWithFailover(
        (connection) =>
          waitForConfirmation(connection, signature, commitment, {
            pollIntervalMs: this.config.confirmPollIntervalMs,
            signal: this.lifecycle?.signal,
          }),
        { maxRetries: CONFIRM_MAX_RETRIES, label: "confirmTransaction" }
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

  async postRpc<T>(body: JsonRpcRequest): Promise<JsonRpcResponse<T>> {
    return this.executeWithFailover(
      async (_connection, endpoint) => {
        const response = await this.transport.post<JsonRpcResponse<T>>(endpoint, body, {
          timeoutMs: this.config.rpcTimeoutMs,
        });
        if (response.status < 200 || response.status >= 300) {
          throw new HttpStatusError(response.status);
        }
        return response.data;
      },
      { label: body.method }
    );
  }

  // ==========================================================================
  // Health
  // ==========================================================================

  /**
   * Health-check every provider concurrently with a `getHealth` POST.
   * Aborting `signal` cancels checks in flight without recording them as
   * failures.
   */
  async runHealthChecks(signal?: AbortSignal): Promise<void> {
    await Promise.all(this.providers.map((provider) => this.checkProvider(provider, signal)));
  }

  private async checkProvider(provider: ProviderEntry, signal?: AbortSignal): Promise<void> {
    const startedAt = Date.now();

    try {
      const response = await this.transport.post<JsonRpcResponse<string>>(
        provider.endpoint,
        { jsonrpc: "2.0", id: 1, method: "getHealth" },
        { timeoutMs: this.config.healthCheckTimeoutMs, signal }
      );

      if (response.status === 200) {
        provider.health.recordSuccess(Date.now() - startedAt);
      } else {
        provider.health.recordFailure(
          new ProviderUnavailableError(`HTTP ${response.status}`, provider.endpoint)
        );
      }
    } catch (error) {
      if (signal?.aborted) return;
      const message = error instanceof RequestTimeoutError ? "Timeout" : errorMessage(error);
      provider.health.recordFailure(
        new ProviderUnavailableError(message, provider.endpoint, toError(error))
      );
    }

    setProviderScore(provider.label, provider.health.score());

    logger.debug("Health check completed", {
      endpoint: provider.label,
      status: provider.health.getStatus(),
      score: provider.health.score(),
    });
  }

  getHealthSummary(): HealthSummary {
    const summary: HealthSummary = {};
    for (const provider of this.providers) {
      const { endpoint, ...rest } = provider.health.snapshot();
      summary[endpoint] = rest;
    }
    return summary;
  }
}
