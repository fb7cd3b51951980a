/**
 * Environment configuration with Zod validation.
 * Fail fast on startup if configuration is invalid.
 */

import { z } from "zod";
import { logger } from "../utils/logger.js";
import { ValidationError } from "../utils/errors.js";

// ============================================================================
// Schema Definition
// ============================================================================

const positiveInt = () => z.coerce.number().int().positive();
const solAmount = () => z.coerce.number().nonnegative().finite();
const lamportsAmount = () =>
  z
    .string()
    .regex(/^\d+$/, "must be a whole number of lamports")
    .transform((value) => BigInt(value));

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Node environment"),

  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Logging level"),

  // Solana RPC: a single URL runs one endpoint, a list runs the failover router
  SOLANA_RPC_URL: z
    .string()
    .optional()
    .describe("Single Solana RPC endpoint"),

  SOLANA_RPC_URLS: z
    .string()
    .optional()
    .describe("Comma-separated list of Solana RPC endpoints for failover"),

  RPC_COMMITMENT: z
    .enum(["processed", "confirmed", "finalized"])
    .default("confirmed"),

  RPC_HEALTH_CHECK_INTERVAL_MS: positiveInt().default(30_000),
  RPC_BLOCKHASH_REFRESH_INTERVAL_MS: positiveInt().default(5_000),
  RPC_TIMEOUT_MS: positiveInt().default(10_000),
  RPC_MIN_SUCCESS_RATE: z.coerce.number().min(0).max(1).default(0.8),
  RPC_MAX_LATENCY_MS: positiveInt().default(2_000),
  RPC_FAILOVER_MAX_RETRIES: positiveInt().default(3),
  RPC_SEND_MAX_RETRIES: positiveInt().default(3),

  HTTP_POOL_MAX_SOCKETS: positiveInt().default(100),
  HTTP_POOL_MAX_SOCKETS_PER_HOST: positiveInt().default(10),

  // Identity pool
  IDENTITY_COUNT: positiveInt().default(20),
  IDENTITY_MIN_BALANCE_SOL: solAmount().default(0.1),
  IDENTITY_TARGET_BALANCE_SOL: solAmount().default(1.0),
  IDENTITY_STORAGE_PATH: z.string().min(1).optional(),
  FUNDING_SECRET_KEY: z
    .string()
    .regex(/^[1-9A-HJ-NP-Za-km-z]+$/, "FUNDING_SECRET_KEY must be base58")
    .optional()
    .describe("Base58 secret key of the identity that funds the pool"),

  // Bundles
  BUNDLE_INITIAL_TIP_LAMPORTS: lamportsAmount().default("100000000"),
  BUNDLE_TIP_INCREMENT_LAMPORTS: lamportsAmount().default("50000000"),
  BUNDLE_MAX_TIP_LAMPORTS: lamportsAmount().default("1000000000"),
  BUNDLE_MAX_RETRIES: positiveInt().default(3),
  BUNDLE_PRIORITY_FEE_MICRO_LAMPORTS: positiveInt().default(100_000),

  JITO_BLOCK_ENGINE_URLS: z
    .string()
    .optional()
    .describe("Comma-separated Jito block engine URLs"),
  JITO_TIMEOUT_MS: positiveInt().default(5_000),
  JITO_CONFIRMATION_TIMEOUT_MS: positiveInt().default(30_000),

  // Operations server (/health, /metrics); disabled when no port is set
  OPS_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
  OPS_HOST: z.string().default("0.0.0.0"),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Env = z.infer<typeof envSchema>;

// ============================================================================
// Validation & Initialization
// ============================================================================

/**
 * Validate environment variables on startup
 *
 * @throws {ValidationError} listing every invalid variable
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errorMessages = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");

    logger.error("Environment validation failed:\n" + errorMessages);

    throw new ValidationError(
      `Environment validation failed:\n${errorMessages}\n\n` +
        `Please check your .env file and ensure all required variables are set correctly.`
    );
  }

  const parsed = result.data;
  validateConstraints(parsed);

  logger.info("Environment validation successful", {
    nodeEnv: parsed.NODE_ENV,
    rpcEndpoints: getRpcEndpointsFromEnv(parsed).length,
    identityCount: parsed.IDENTITY_COUNT,
    logLevel: parsed.LOG_LEVEL,
  });

  return parsed;
}

function validateConstraints(env: Env): void {
  const rpcUrls = getRpcEndpointsFromEnv(env);

  if (rpcUrls.length === 0) {
    throw new ValidationError(
      "Either SOLANA_RPC_URL or SOLANA_RPC_URLS must be set."
    );
  }

  for (const url of [...rpcUrls, ...getJitoEndpointsFromEnv(env)]) {
    try {
      new URL(url);
    } catch {
      throw new ValidationError(`Invalid endpoint URL format: ${url}`);
    }

    if (env.NODE_ENV === "production" && !url.startsWith("https://")) {
      throw new ValidationError(`Endpoint must use HTTPS in production: ${url}`);
    }
  }

  if (env.IDENTITY_TARGET_BALANCE_SOL < env.IDENTITY_MIN_BALANCE_SOL) {
    throw new ValidationError(
      "IDENTITY_TARGET_BALANCE_SOL must be >= IDENTITY_MIN_BALANCE_SOL"
    );
  }

  if (env.BUNDLE_MAX_TIP_LAMPORTS < env.BUNDLE_INITIAL_TIP_LAMPORTS) {
    throw new ValidationError(
      "BUNDLE_MAX_TIP_LAMPORTS must be >= BUNDLE_INITIAL_TIP_LAMPORTS"
    );
  }
}

// ============================================================================
// Helpers: endpoint lists
// ============================================================================

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
}

/**
 * SOLANA_RPC_URLS takes priority over SOLANA_RPC_URL.
 */
export function getRpcEndpointsFromEnv(env: Env): string[] {
  const list = splitList(env.SOLANA_RPC_URLS);
  if (list.length > 0) return list;
  return env.SOLANA_RPC_URL ? [env.SOLANA_RPC_URL] : [];
}

export function getJitoEndpointsFromEnv(env: Env): string[] {
  return splitList(env.JITO_BLOCK_ENGINE_URLS);
}
