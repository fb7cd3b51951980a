/**
 * Operations endpoints: liveness with provider health, and Prometheus
 * metrics.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type { HealthSummary } from "./types/rpc.js";
import { redactEndpoint } from "./utils/helpers.js";
import { getMetrics, getMetricsContentType } from "./utils/metrics.js";

export interface OpsServerDeps {
  /** Node health from the current endpoint; null when unreachable */
  checkRpc(): Promise<string | null>;
  /** Per-provider health; null in single-endpoint mode */
  getHealthSummary(): HealthSummary | null;
}

export function createOpsServer(deps: OpsServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get("/health", async () => {
    const rpc = await deps.checkRpc();
    const summary = deps.getHealthSummary();

    const providers = summary
      ? Object.fromEntries(
          Object.entries(summary).map(([endpoint, health]) => [redactEndpoint(endpoint), health])
        )
      : null;

    return {
      status: rpc === "ok" ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      rpc: { health: rpc },
      providers,
    };
  });

  app.get("/metrics", async (_, reply) => {
    reply.header("Content-Type", getMetricsContentType());
    return getMetrics();
  });

  return app;
}
