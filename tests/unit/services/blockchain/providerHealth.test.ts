/**
 * Provider Health Tracker Tests
 */

import { describe, it, expect } from "vitest";
import {
  NEUTRAL_SCORE,
  ProviderHealthTracker,
} from "../../../../src/services/blockchain/providerHealth.js";

describe("ProviderHealthTracker", () => {
  // ==========================================================================
  // Status transitions
  // ==========================================================================

  describe("status", () => {
    it("should start unknown with a neutral score", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      expect(tracker.getStatus()).toBe("unknown");
      expect(tracker.score()).toBe(NEUTRAL_SCORE);
      expect(tracker.successRate).toBe(0);
    });

    it("should become degraded after one failure", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      tracker.recordFailure("boom");

      expect(tracker.getStatus()).toBe("degraded");
    });

    it("should become unhealthy after three consecutive failures", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      tracker.recordFailure("one");
      tracker.recordFailure("two");
      expect(tracker.getStatus()).toBe("degraded");

      tracker.recordFailure(new Error("three"));
      expect(tracker.getStatus()).toBe("unhealthy");
    });

    it("should recover to healthy on the next success", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      tracker.recordFailure("one");
      tracker.recordFailure("two");
      tracker.recordFailure("three");
      tracker.recordSuccess(50);

      const snapshot = tracker.snapshot();
      expect(snapshot.status).toBe("healthy");
      expect(snapshot.consecutiveFailures).toBe(0);
      expect(snapshot.lastError).toBeNull();
    });
  });

  // ==========================================================================
  // Scoring
  // ==========================================================================

  describe("score", () => {
    it("should penalize latency", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      tracker.recordSuccess(100);
      tracker.recordSuccess(100);
      tracker.recordSuccess(100);

      // 1 - (100/1000) * 0.2
      expect(tracker.score()).toBeCloseTo(0.98, 10);
    });

    it("should combine success rate, latency and failure penalties", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      tracker.recordSuccess(100);
      tracker.recordSuccess(100);
      tracker.recordSuccess(100);
      tracker.recordFailure("timeout");

      // 0.75 - 0.02 - (1/5) * 0.3
      expect(tracker.score()).toBeCloseTo(0.67, 10);
    });

    it("should stay within [0, 1] for any history", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");
      const history = [5000, -1, -1, 20, -1, -1, -1, -1, -1, 0, 3000, -1];

      for (const entry of history) {
        if (entry < 0) {
          tracker.recordFailure("failed");
        } else {
          tracker.recordSuccess(entry);
        }
        const score = tracker.score();
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    });

    it("should average latency over the last 100 samples only", () => {
      const tracker = new ProviderHealthTracker("https://rpc.test");

      for (let i = 0; i < 100; i++) tracker.recordSuccess(1000);
      for (let i = 0; i < 100; i++) tracker.recordSuccess(10);

      expect(tracker.getAverageLatencyMs()).toBe(10);
    });
  });

  // ==========================================================================
  // Snapshot
  // ==========================================================================

  it("should report counters and the injected clock in snapshots", () => {
    const tracker = new ProviderHealthTracker("https://rpc.test", () => 42);

    tracker.recordSuccess(30);
    tracker.recordFailure(new Error("HTTP 503"));

    expect(tracker.snapshot()).toEqual({
      endpoint: "https://rpc.test",
      status: "degraded",
      avgLatencyMs: 30,
      successRate: 0.5,
      consecutiveFailures: 1,
      totalRequests: 2,
      successfulRequests: 1,
      score: expect.any(Number),
      lastError: "HTTP 503",
      lastCheckAt: 42,
    });
  });
});
