/**
 * Per-provider health record.
 *
 * Status follows consecutive failures only: 3+ is unhealthy, 1-2 degraded,
 * 0 healthy. "unknown" lasts until the first observation.
 */

import type { ProviderHealthSnapshot, ProviderStatus } from "../../types/rpc.js";
import { clamp } from "../../utils/helpers.js";

const LATENCY_WINDOW = 100;
const UNHEALTHY_AFTER = 3;

/** Score for a provider nobody has talked to yet. */
export const NEUTRAL_SCORE = 0.5;

export class ProviderHealthTracker {
  private status: ProviderStatus = "unknown";
  private readonly latencies: number[] = [];
  private avgLatencyMs = 0;
  private totalRequests = 0;
  private successfulRequests = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;
  private lastCheckAt: number | null = null;

  constructor(
    public readonly endpoint: string,
    private readonly now: () => number = Date.now
  ) {}

  recordSuccess(latencyMs: number): void {
    this.totalRequests++;
    this.successfulRequests++;
    this.consecutiveFailures = 0;

    this.latencies.push(latencyMs);
    if (this.latencies.length > LATENCY_WINDOW) {
      this.latencies.shift();
    }
    this.avgLatencyMs =
      this.latencies.reduce((sum, value) => sum + value, 0) / this.latencies.length;

    this.status = "healthy";
    this.lastError = null;
    this.lastCheckAt = this.now();
  }

  recordFailure(error: Error | string): void {
    this.totalRequests++;
    this.consecutiveFailures++;
    this.lastError = typeof error === "string" ? error : error.message;
    this.status = this.consecutiveFailures >= UNHEALTHY_AFTER ? "unhealthy" : "degraded";
    this.lastCheckAt = this.now();
  }

  get successRate(): number {
    if (this.totalRequests === 0) return 0;
    return this.successfulRequests / this.totalRequests;
  }

  getStatus(): ProviderStatus {
    return this.status;
  }

  getAverageLatencyMs(): number {
    return this.avgLatencyMs;
  }

  /**
   * successRate - min(avgLatency/1000, 1)*0.2 - min(consecutiveFailures/5, 1)*0.3,
   * clamped to [0, 1].
   */
  score(): number {
    if (this.totalRequests === 0) return NEUTRAL_SCORE;

    const latencyPenalty = Math.min(this.avgLatencyMs / 1000, 1) * 0.2;
    const failurePenalty = Math.min(this.consecutiveFailures / 5, 1) * 0.3;

    return clamp(this.successRate - latencyPenalty - failurePenalty, 0, 1);
  }

  snapshot(): ProviderHealthSnapshot {
    return {
      endpoint: this.endpoint,
      status: this.status,
      avgLatencyMs: this.avgLatencyMs,
      successRate: this.successRate,
      consecutiveFailures: this.consecutiveFailures,
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      score: this.score(),
      lastError: this.lastError,
      lastCheckAt: this.lastCheckAt,
    };
  }
}
