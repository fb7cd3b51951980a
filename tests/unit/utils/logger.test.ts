/**
 * Log Sanitization Tests
 */

import { describe, it, expect } from "vitest";
import { sanitizeForLogging } from "../../../src/utils/logger.js";

describe("sanitizeForLogging", () => {
  it("should redact sensitive keys at any depth", () => {
    expect(
      sanitizeForLogging({
        endpoint: "https://rpc.test",
        secretKey: "test-secret",
        nested: { fundingKeypair: [1, 2, 3], Authorization: "Bearer test-token" },
      })
    ).toEqual({
      endpoint: "https://rpc.test",
      secretKey: "[REDACTED]",
      nested: { fundingKeypair: "[REDACTED]", Authorization: "[REDACTED]" },
    });
  });

  it("should flatten errors and stringify bigints", () => {
    expect(
      sanitizeForLogging({ error: new TypeError("bad"), tips: [1n, 250_000_000n] })
    ).toEqual({
      error: { name: "TypeError", message: "bad" },
      tips: ["1", "250000000"],
    });
  });

  it("should pass primitives through", () => {
    expect(sanitizeForLogging("plain")).toBe("plain");
    expect(sanitizeForLogging(null)).toBeNull();
  });
});
