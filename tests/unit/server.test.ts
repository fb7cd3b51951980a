/**
 * Ops Server Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { createOpsServer } from "../../src/server.js";
import type { HealthSummary } from "../../src/types/rpc.js";

const SUMMARY: HealthSummary = {
  "https://rpc-a.test/?api-key=test-key": {
    status: "healthy",
    avgLatencyMs: 50,
    successRate: 1,
    consecutiveFailures: 0,
    totalRequests: 4,
    successfulRequests: 4,
    score: 0.975,
    lastError: null,
    lastCheckAt: 1_700_000_000_000,
  },
};

describe("ops server", () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it("should report ok with providers keyed by redacted endpoint", async () => {
    app = createOpsServer({
      checkRpc: async () => "ok",
      getHealthSummary: () => SUMMARY,
    });

    const response = await app.inject({ method: "GET", url: "/health" });
    const body: unknown = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      rpc: { health: "ok" },
      providers: {
        "https://rpc-a.test": {
          status: "healthy",
          score: 0.975,
          totalRequests: 4,
        },
      },
    });
    expect(response.body).not.toContain("test-key");
  });

  it("should report degraded when the node is unreachable", async () => {
    app = createOpsServer({
      checkRpc: async () => null,
      getHealthSummary: () => null,
    });

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(JSON.parse(response.body)).toMatchObject({
      status: "degraded",
      rpc: { health: null },
      providers: null,
    });
  });

  it("should serve Prometheus metrics", async () => {
    app = createOpsServer({
      checkRpc: async () => "ok",
      getHealthSummary: () => null,
    });

    const response = await app.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toContain("text/plain");
    expect(response.body).toContain("# TYPE bundle_submissions_total counter");
  });
});
