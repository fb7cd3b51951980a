/**
 * Wires the services together from validated configuration.
 */

import { Keypair } from "@solana/web3.js";
import bs58 from "bs58";
import { getJitoEndpointsFromEnv, getRpcEndpointsFromEnv, type Env } from "./config/env.js";
import { FailoverRouter } from "./services/blockchain/failoverRouter.js";
import { HttpPool } from "./services/blockchain/httpPool.js";
import { ResilientClient } from "./services/blockchain/resilientClient.js";
import { BundleCoordinator } from "./services/trading/bundleCoordinator.js";
import { JitoRelay } from "./services/trading/jitoRelay.js";
import { FileIdentityStore } from "./services/wallet/identityStore.js";
import { IdentityPool } from "./services/wallet/identityPool.js";
import type { BundleTarget, InstructionBuilder } from "./types/bundle.js";
import type { ConnectionFactory, HealthSummary } from "./types/rpc.js";
import { ConstructionError, toError } from "./utils/errors.js";
import { solToLamports } from "./utils/helpers.js";
import { logger } from "./utils/logger.js";

export interface RuntimeOptions<TTarget extends BundleTarget> {
  /** Program-specific encoding; without it no coordinator is created */
  instructionBuilder?: InstructionBuilder<TTarget>;
  connectionFactory?: ConnectionFactory;
}

export interface Runtime<TTarget extends BundleTarget = BundleTarget> {
  readonly transport: HttpPool;
  readonly router: FailoverRouter | null;
  readonly client: ResilientClient;
  readonly identityPool: IdentityPool;
  readonly fundingIdentity: Keypair | null;
  readonly relay: JitoRelay | null;
  readonly coordinator: BundleCoordinator<TTarget> | null;
  getHealthSummary(): HealthSummary | null;
  start(): Promise<void>;
  stop(): Promise<void>;
}

function decodeFundingIdentity(secretKey: string | undefined): Keypair | null {
  if (!secretKey) return null;
  try {
    return Keypair.fromSecretKey(bs58.decode(secretKey));
  } catch (error) {
    throw new ConstructionError("FUNDING_SECRET_KEY is not a valid secret key", toError(error));
  }
}

export function createRuntime<TTarget extends BundleTarget = BundleTarget>(
  env: Env,
  options: RuntimeOptions<TTarget> = {}
): Runtime<TTarget> {
  const endpoints = getRpcEndpointsFromEnv(env);
  if (endpoints.length === 0) {
    throw new ConstructionError("No RPC endpoints configured");
  }

  const transport = new HttpPool({
    maxSockets: env.HTTP_POOL_MAX_SOCKETS,
    maxSocketsPerHost: env.HTTP_POOL_MAX_SOCKETS_PER_HOST,
    timeoutMs: env.RPC_TIMEOUT_MS,
  });

  const clientConfig = {
    commitment: env.RPC_COMMITMENT,
    blockhashRefreshIntervalMs: env.RPC_BLOCKHASH_REFRESH_INTERVAL_MS,
    rpcTimeoutMs: env.RPC_TIMEOUT_MS,
    sendMaxRetries: env.RPC_SEND_MAX_RETRIES,
  };

  let router: FailoverRouter | null = null;
  let client: ResilientClient;

  if (endpoints.length > 1) {
    router = new FailoverRouter(
      endpoints,
      { transport, connectionFactory: options.connectionFactory },
      {
        healthCheckIntervalMs: env.RPC_HEALTH_CHECK_INTERVAL_MS,
        blockhashRefreshIntervalMs: env.RPC_BLOCKHASH_REFRESH_INTERVAL_MS,
        rpcTimeoutMs: env.RPC_TIMEOUT_MS,
        minSuccessRate: env.RPC_MIN_SUCCESS_RATE,
        maxLatencyMs: env.RPC_MAX_LATENCY_MS,
        maxRetries: env.RPC_FAILOVER_MAX_RETRIES,
        commitment: env.RPC_COMMITMENT,
      }
    );
    client = new ResilientClient({ mode: "failover", strategy: router, config: clientConfig });
  } else {
    client = new ResilientClient({
      mode: "single",
      endpoint: endpoints[0],
      transport,
      connectionFactory: options.connectionFactory,
      config: clientConfig,
    });
  }

  const identityPool = new IdentityPool(
    client,
    {
      identityCount: env.IDENTITY_COUNT,
      minBalanceLamports: solToLamports(env.IDENTITY_MIN_BALANCE_SOL),
      targetBalanceLamports: solToLamports(env.IDENTITY_TARGET_BALANCE_SOL),
    },
    env.IDENTITY_STORAGE_PATH ? new FileIdentityStore(env.IDENTITY_STORAGE_PATH) : null
  );

  const fundingIdentity = decodeFundingIdentity(env.FUNDING_SECRET_KEY);
  const jitoEndpoints = getJitoEndpointsFromEnv(env);

  // Tips are paid by the funding identity
  const relay = fundingIdentity
    ? new JitoRelay(fundingIdentity, {
        ...(jitoEndpoints.length > 0 && { blockEngineUrls: jitoEndpoints }),
        timeoutMs: env.JITO_TIMEOUT_MS,
        confirmationTimeoutMs: env.JITO_CONFIRMATION_TIMEOUT_MS,
      })
    : null;

  const coordinator =
    relay && options.instructionBuilder
      ? new BundleCoordinator(client, identityPool, relay, options.instructionBuilder, {
          initialTipLamports: env.BUNDLE_INITIAL_TIP_LAMPORTS,
          tipIncrementLamports: env.BUNDLE_TIP_INCREMENT_LAMPORTS,
          maxTipLamports: env.BUNDLE_MAX_TIP_LAMPORTS,
          maxRetries: env.BUNDLE_MAX_RETRIES,
          priorityFeeMicroLamports: env.BUNDLE_PRIORITY_FEE_MICRO_LAMPORTS,
        })
      : null;

  logger.info("Runtime created", {
    mode: client.mode,
    endpoints: endpoints.length,
    identityCount: env.IDENTITY_COUNT,
    bundling: coordinator !== null,
  });

  return {
    transport,
    router,
    client,
    identityPool,
    fundingIdentity,
    relay,
    coordinator,

    getHealthSummary: () => (router ? router.getHealthSummary() : null),

    async start() {
      await client.start();

      if (fundingIdentity) {
        await identityPool.initialize(fundingIdentity);
      } else {
        logger.warn("FUNDING_SECRET_KEY not set, identity pool not initialized");
      }
    },

    async stop() {
      await client.stop();
      await transport.close();
      logger.info("Runtime stopped");
    },
  };
}
