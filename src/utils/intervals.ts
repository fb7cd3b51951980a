import { OperationCancelledError } from "./errors.js";
import { sleep } from "./helpers.js";
import { logger } from "./logger.js";

export interface BackgroundLoop {
  readonly label: string;
  /** Abort the loop, including an in-flight sleep, and wait for it to exit. */
  stop(): Promise<void>;
}

export interface BackgroundLoopOptions {
  /** Run the first iteration right away instead of after one interval. */
  runImmediately?: boolean;
}

const activeLoops = new Map<BackgroundLoop, string>();

/**
 * Start a cooperative loop: run `task`, sleep `intervalMs`, repeat until
 * stopped. A failing iteration is logged and the loop carries on.
 */
export function startBackgroundLoop(
  task: (signal: AbortSignal) => Promise<void>,
  intervalMs: number,
  label: string,
  options: BackgroundLoopOptions = {}
): BackgroundLoop {
  const controller = new AbortController();
  const { signal } = controller;

  const run = async (): Promise<void> => {
    try {
      if (!options.runImmediately) {
        await sleep(intervalMs, signal);
      }
      while (!signal.aborted) {
        try {
          await task(signal);
        } catch (error) {
          if (signal.aborted) break;
          logger.error("Background loop iteration failed", { label, error });
        }
        await sleep(intervalMs, signal);
      }
    } catch (error) {
      if (!(error instanceof OperationCancelledError)) {
        logger.error("Background loop terminated", { label, error });
      }
    }
  };

  const done = run();

  const loop: BackgroundLoop = {
    label,
    stop: async () => {
      controller.abort();
      await done;
      activeLoops.delete(loop);
    },
  };

  activeLoops.set(loop, label);
  return loop;
}

export function getActiveLoopCount(): number {
  return activeLoops.size;
}

export async function stopAllLoops(): Promise<void> {
  for (const [loop, label] of activeLoops.entries()) {
    await loop.stop();
    logger.info("Stopped background loop", { label });
  }
}
