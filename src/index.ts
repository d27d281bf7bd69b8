/**
 * LP Delta Hedger
 *
 * Entry point: reads LP positions on Base, classifies their risk and keeps
 * the aggregate delta hedged with a perp position.
 */

import { loadConfig } from "./lib/config";
import { type DatabaseInstance, createDatabase } from "./lib/db";
import { getEnv } from "./lib/env";
import { createLogger, toError } from "./lib/logger";
import { createMetricsStore, startHttpServer } from "./server";
import { startWorker } from "./worker";

const main = async (): Promise<void> => {
  const bootLogger = createLogger({ level: "info" });

  bootLogger.info("LP Delta Hedger starting...");

  try {
    // 1. Validate environment configuration
    bootLogger.info("Validating environment configuration...");
    const config = loadConfig(getEnv());
    const logger = createLogger(config.logging);
    logger.info("Environment configuration validated", {
      nodeEnv: config.server.nodeEnv,
      venue: config.venue.venue,
      symbol: config.worker.symbol,
    });

    // 2. Initialize database connection (optional; audit trail stays in memory without it)
    let db: DatabaseInstance | null = null;
    if (config.database.url) {
      logger.info("Initializing database connection...");
      db = createDatabase(config.database.url);
      logger.info("Database connection established");
    } else {
      logger.warn("DATABASE_URL not set; hedge executions are kept in memory only");
    }

    // 3. Start worker (hedging loop)
    logger.info("Starting worker...");
    const metrics = createMetricsStore();
    const worker = await startWorker({ config, logger, db, metrics });

    // 4. Start HTTP server (health checks, metrics, admin)
    logger.info("Starting HTTP server...");
    const httpServer = await startHttpServer({
      port: config.server.port,
      logger,
      runner: worker.runner,
      metrics,
      emergencyClose: worker.emergencyClose,
      db: db?.db,
      rpcClient: worker.rpcClient,
      adminToken: config.server.adminToken,
    });

    // 5. Setup graceful shutdown
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`Received ${signal}, initiating graceful shutdown`);

      await worker.shutdown();
      await httpServer.close();
      await db?.close();

      logger.info("Graceful shutdown complete");
      process.exit(0);
    };

    const onSignal = (signal: string): void => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", toError(error));
        process.exit(1);
      });
    };
    process.on("SIGTERM", () => onSignal("SIGTERM"));
    process.on("SIGINT", () => onSignal("SIGINT"));

    logger.info("Hedger initialized successfully");
  } catch (error) {
    bootLogger.error("Fatal error during startup", toError(error));
    process.exit(1);
  }
};

main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
