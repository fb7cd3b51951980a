/**
 * Background Loop Tests
 */

import { describe, it, expect } from "vitest";
import {
  getActiveLoopCount,
  startBackgroundLoop,
  stopAllLoops,
} from "../../../src/utils/intervals.js";
import { sleep } from "../../../src/utils/helpers.js";

describe("startBackgroundLoop", () => {
  it("should run immediately when asked and stop on demand", async () => {
    let runs = 0;
    const loop = startBackgroundLoop(
      async () => {
        runs++;
      },
      60_000,
      "immediate",
      { runImmediately: true }
    );

    await sleep(5);
    expect(runs).toBe(1);
    expect(loop.label).toBe("immediate");

    await loop.stop();
    expect(getActiveLoopCount()).toBe(0);
  });

  it("should wait one interval before the first run by default", async () => {
    let runs = 0;
    const loop = startBackgroundLoop(
      async () => {
        runs++;
      },
      60_000,
      "delayed"
    );

    await sleep(5);
    expect(runs).toBe(0);
    await loop.stop();
  });

  it("should keep going after a failed iteration", async () => {
    let runs = 0;
    const loop = startBackgroundLoop(
      async () => {
        runs++;
        if (runs === 1) throw new Error("transient");
      },
      1,
      "flaky",
      { runImmediately: true }
    );

    await sleep(50);
    await loop.stop();
    expect(runs).toBeGreaterThan(1);
  });

  it("should hand the task an abort signal and stop every loop", async () => {
    const signals: AbortSignal[] = [];
    startBackgroundLoop(
      async (signal) => {
        signals.push(signal);
      },
      60_000,
      "a",
      { runImmediately: true }
    );
    startBackgroundLoop(async () => undefined, 60_000, "b");

    await sleep(5);
    expect(getActiveLoopCount()).toBe(2);

    await stopAllLoops();
    expect(getActiveLoopCount()).toBe(0);
    expect(signals[0].aborted).toBe(true);
  });
});
