/**
 * Environment Validation Tests
 */

import { describe, it, expect } from "vitest";
import {
  getJitoEndpointsFromEnv,
  getRpcEndpointsFromEnv,
  validateEnv,
} from "../../../src/config/env.js";
import { ValidationError } from "../../../src/utils/errors.js";

const BASE = { SOLANA_RPC_URL: "https://rpc-a.test" };

describe("validateEnv", () => {
  it("should apply defaults", () => {
    const env = validateEnv({ ...BASE });

    expect(env.NODE_ENV).toBe("development");
    expect(env.RPC_COMMITMENT).toBe("confirmed");
    expect(env.RPC_FAILOVER_MAX_RETRIES).toBe(3);
    expect(env.IDENTITY_COUNT).toBe(20);
    expect(env.IDENTITY_MIN_BALANCE_SOL).toBe(0.1);
    expect(env.BUNDLE_INITIAL_TIP_LAMPORTS).toBe(100_000_000n);
    expect(env.BUNDLE_TIP_INCREMENT_LAMPORTS).toBe(50_000_000n);
    expect(env.BUNDLE_MAX_TIP_LAMPORTS).toBe(1_000_000_000n);
    expect(env.OPS_PORT).toBeUndefined();
    expect(env.OPS_HOST).toBe("0.0.0.0");
  });

  it("should coerce numbers and parse lamport amounts as bigint", () => {
    const env = validateEnv({
      ...BASE,
      IDENTITY_COUNT: "5",
      OPS_PORT: "9090",
      BUNDLE_MAX_TIP_LAMPORTS: "9007199254740993",
    });

    expect(env.IDENTITY_COUNT).toBe(5);
    expect(env.OPS_PORT).toBe(9090);
    expect(env.BUNDLE_MAX_TIP_LAMPORTS).toBe(9_007_199_254_740_993n);
  });

  it("should reject fractional lamports with the variable name", () => {
    expect(() => validateEnv({ ...BASE, BUNDLE_INITIAL_TIP_LAMPORTS: "1.5" })).toThrow(
      "BUNDLE_INITIAL_TIP_LAMPORTS: must be a whole number of lamports"
    );
  });

  it("should require at least one RPC endpoint", () => {
    expect(() => validateEnv({})).toThrow(
      "Either SOLANA_RPC_URL or SOLANA_RPC_URLS must be set."
    );
  });

  it("should reject malformed endpoint URLs", () => {
    expect(() => validateEnv({ ...BASE, JITO_BLOCK_ENGINE_URLS: "not-a-url" })).toThrow(
      "Invalid endpoint URL format: not-a-url"
    );
  });

  it("should require HTTPS endpoints in production", () => {
    expect(() =>
      validateEnv({ NODE_ENV: "production", SOLANA_RPC_URL: "http://rpc.test" })
    ).toThrow("Endpoint must use HTTPS in production: http://rpc.test");
  });

  it("should reject a target balance below the minimum", () => {
    expect(() =>
      validateEnv({ ...BASE, IDENTITY_MIN_BALANCE_SOL: "2", IDENTITY_TARGET_BALANCE_SOL: "1" })
    ).toThrow(ValidationError);
  });

  it("should reject a max tip below the initial tip", () => {
    expect(() =>
      validateEnv({
        ...BASE,
        BUNDLE_INITIAL_TIP_LAMPORTS: "200",
        BUNDLE_MAX_TIP_LAMPORTS: "100",
      })
    ).toThrow("BUNDLE_MAX_TIP_LAMPORTS must be >= BUNDLE_INITIAL_TIP_LAMPORTS");
  });
});

describe("endpoint lists", () => {
  it("should prefer the URL list over the single URL", () => {
    const env = validateEnv({
      ...BASE,
      SOLANA_RPC_URLS: " https://rpc-b.test , https://rpc-c.test,",
      JITO_BLOCK_ENGINE_URLS: "https://engine.test",
    });

    expect(getRpcEndpointsFromEnv(env)).toEqual(["https://rpc-b.test", "https://rpc-c.test"]);
    expect(getJitoEndpointsFromEnv(env)).toEqual(["https://engine.test"]);
  });

  it("should fall back to the single URL", () => {
    expect(getRpcEndpointsFromEnv(validateEnv({ ...BASE }))).toEqual(["https://rpc-a.test"]);
  });
});
