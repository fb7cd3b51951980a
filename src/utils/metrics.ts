import client from "prom-client";

const register = new client.Registry();

let defaultMetricsEnabled = false;

/**
 * Process-level metrics (CPU, memory, event loop). Enabled by the runtime,
 * not on import.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  client.collectDefaultMetrics({
    register,
    prefix: "submitter_",
  });
  defaultMetricsEnabled = true;
}

// ---------------------------------------------------------------------------
// Metric Definitions
// ---------------------------------------------------------------------------

const rpcRequestDuration = new client.Histogram({
  name: "rpc_request_duration_ms",
  help: "Latency of Solana RPC requests",
  labelNames: ["endpoint", "method", "status"],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [register],
});

const rpcProviderScore = new client.Gauge({
  name: "rpc_provider_score",
  help: "Health score of each RPC provider (0-1)",
  labelNames: ["endpoint"],
  registers: [register],
});

const rpcProviderSwitches = new client.Counter({
  name: "rpc_provider_switches_total",
  help: "Current provider changes",
  labelNames: ["from", "to"],
  registers: [register],
});

const rpcFailoverExhausted = new client.Counter({
  name: "rpc_failover_exhausted_total",
  help: "Operations that failed on every attempted provider",
  labelNames: ["method"],
  registers: [register],
});

const bundleSubmissions = new client.Counter({
  name: "bundle_submissions_total",
  help: "Bundle submission attempts by outcome",
  labelNames: ["outcome"],
  registers: [register],
});

const bundleTipLamports = new client.Histogram({
  name: "bundle_tip_lamports",
  help: "Tip offered per bundle attempt",
  buckets: [1e5, 1e6, 1e7, 5e7, 1e8, 2e8, 5e8, 1e9],
  registers: [register],
});

const identityFundings = new client.Counter({
  name: "identity_fundings_total",
  help: "Identity funding transfers",
  labelNames: ["status"],
  registers: [register],
});

const errorsTotal = new client.Counter({
  name: "errors_total",
  help: "Total errors grouped by type",
  labelNames: ["type"],
  registers: [register],
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function recordRpcRequest(
  endpoint: string,
  method: string,
  durationMs: number,
  status: "success" | "error"
): void {
  rpcRequestDuration.observe({ endpoint, method, status }, durationMs);
}

export function setProviderScore(endpoint: string, score: number): void {
  rpcProviderScore.set({ endpoint }, score);
}

export function recordProviderSwitch(from: string, to: string): void {
  rpcProviderSwitches.inc({ from, to });
}

export function recordFailoverExhausted(method: string): void {
  rpcFailoverExhausted.inc({ method });
}

export function recordBundleSubmission(
  outcome: "landed" | "failed",
  tipLamports: bigint
): void {
  bundleSubmissions.inc({ outcome });
  bundleTipLamports.observe(Number(tipLamports));
}

export function recordIdentityFunding(status: "success" | "failed"): void {
  identityFundings.inc({ status });
}

export function recordError(type: string): void {
  errorsTotal.inc({ type });
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export { register };
