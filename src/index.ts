import "dotenv/config";
import type { FastifyInstance } from "fastify";
import { validateEnv } from "./config/env.js";
import { createRuntime, type Runtime } from "./runtime.js";
import { createOpsServer } from "./server.js";
import { errorMessage, isOperationalError } from "./utils/errors.js";
import { stopAllLoops } from "./utils/intervals.js";
import { logger } from "./utils/logger.js";
import { enableDefaultMetrics, recordError } from "./utils/metrics.js";

let runtime: Runtime | null = null;
let server: FastifyInstance | null = null;

const start = async (): Promise<void> => {
  try {
    const env = validateEnv();

    logger.info("Starting application...");
    enableDefaultMetrics();

    runtime = createRuntime(env);
    await runtime.start();

    const active = runtime;
    logger.info("RPC client ready", { mode: active.client.mode });

    if (env.OPS_PORT !== undefined) {
      server = createOpsServer({
        checkRpc: () => active.client.getHealth(),
        getHealthSummary: () => active.getHealthSummary(),
      });
      await server.listen({ port: env.OPS_PORT, host: env.OPS_HOST });
      logger.info("Ops server started", { port: env.OPS_PORT });
    }
  } catch (error) {
    logger.error("Failed to start application", { error: errorMessage(error) });
    process.exit(1);
  }
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    if (server) {
      await server.close();
      logger.info("Ops server closed");
    }
    if (runtime) {
      await runtime.stop();
    }
    await stopAllLoops();

    logger.info("Shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown", { error: errorMessage(error) });
    process.exit(1);
  }
};

process.on("unhandledRejection", (reason) => {
  recordError("unhandled_rejection");
  logger.error("Unhandled promise rejection", {
    error: errorMessage(reason),
    operational: isOperationalError(reason),
  });
});

process.on("SIGINT", (signal) => void shutdown(signal));
process.on("SIGTERM", (signal) => void shutdown(signal));

void start();
