/**
 * Worker: wires sources, venue, audit trail and the cycle runner, then
 * drives cycles on a fixed interval through the serial queue.
 *
 * Startup sequence:
 * 1. Build the Base client and the configured position sources
 * 2. Build the venue client
 * 3. Restore today's trade count from the audit trail
 * 4. Run the first cycle immediately, then one per interval
 */

import type { PositionSource } from "@/adapters/positions";
import { createPositionSources } from "@/adapters/positions";
import { type VenueClient, createVenueClient } from "@/adapters/venue";
import { toTradingDay } from "@/domains/state";
import { type BasePublicClient, createBasePublicClient } from "@/lib/chain";
import type { AppConfig } from "@/lib/config";
import {
  type DatabaseInstance,
  type HedgeExecutionRepository,
  createInMemoryHedgeExecutionRepository,
  createPostgresHedgeExecutionRepository,
} from "@/lib/db";
import { type Logger, toError } from "@/lib/logger";

import type { EmergencyCloseResult } from "./execution";
import {
  type CycleMetricsSink,
  type CycleRunner,
  type EmergencyCloseOptions,
  createCycleRunner,
} from "./orchestrator";
import { QueueClosedError, createSerialQueue } from "./queue";

export interface StartWorkerConfig {
  config: AppConfig;
  logger: Logger;
  db?: DatabaseInstance | null;
  metrics?: CycleMetricsSink;
  /** Prebuilt collaborators; built from `config` when omitted */
  overrides?: {
    client?: BasePublicClient;
    sources?: readonly PositionSource[];
    venue?: VenueClient;
    repository?: HedgeExecutionRepository;
  };
}

/**
 * Handle returned by startWorker for lifecycle management.
 */
export interface WorkerHandle {
  runner: CycleRunner;
  rpcClient: BasePublicClient;
  /** Queued behind any running cycle */
  emergencyClose: (options?: EmergencyCloseOptions) => Promise<EmergencyCloseResult>;
  shutdown: () => Promise<void>;
}

const startOfTradingDay = (now: Date): Date => new Date(`${toTradingDay(now)}T00:00:00.000Z`);

export const startWorker = async (options: StartWorkerConfig): Promise<WorkerHandle> => {
  const { config, logger, db, metrics, overrides = {} } = options;
  const { intervalMs, symbol, closePositionsOnShutdown } = config.worker;

  const rpcClient = overrides.client ?? createBasePublicClient(config.chain.rpcUrl);
  const sources =
    overrides.sources ?? createPositionSources(config.sources, { client: rpcClient, logger });
  if (sources.length === 0) {
    logger.warn("No position sources configured; every cycle will abort");
  }

  // Paper fills follow the latest pool price
  let referencePrice: number | undefined;
  const venue =
    overrides.venue ??
    createVenueClient(config.venue, { logger, referencePrice: () => referencePrice });

  const repository =
    overrides.repository ??
    (db
      ? createPostgresHedgeExecutionRepository(db.db)
      : createInMemoryHedgeExecutionRepository());

  const initialDailyTradeCount = await repository.countFilledSince(startOfTradingDay(new Date()));

  const runner = createCycleRunner({
    sources,
    owner: config.sources.owner,
    venue,
    repository,
    config: config.hedger,
    symbol,
    logger,
    metrics,
    initialDailyTradeCount,
    onAssessed: (assessed) => {
      referencePrice = assessed.find((entry) => entry.price > 0)?.price ?? referencePrice;
    },
  });

  const queue = createSerialQueue();
  let stopped = false;

  const runCycleJob = async (): Promise<void> => {
    if (queue.countOf("cycle") > 0) {
      logger.warn("Previous cycle still running; tick skipped", { intervalMs });
      return;
    }
    try {
      const report = await queue.enqueue("cycle", () => runner.runCycle());
      if (report && report.durationMs > intervalMs) {
        logger.warn("Cycle took longer than the update interval", {
          durationMs: report.durationMs,
          intervalMs,
        });
      }
    } catch (error) {
      if (error instanceof QueueClosedError) {
        return;
      }
      logger.error("Cycle job failed", toError(error));
    }
  };

  void runCycleJob();
  const interval = setInterval(() => {
    void runCycleJob();
  }, intervalMs);

  logger.info("Worker started", {
    venue: venue.venue,
    symbol,
    sources: sources.map((source) => source.name),
    intervalMs,
    initialDailyTradeCount,
  });

  return {
    runner,
    rpcClient,

    emergencyClose: (closeOptions?: EmergencyCloseOptions): Promise<EmergencyCloseResult> =>
      queue.enqueue("emergency_close", () => runner.emergencyClose(closeOptions)),

    shutdown: async (): Promise<void> => {
      if (stopped) {
        return;
      }
      stopped = true;
      logger.info("Worker shutting down...");

      clearInterval(interval);
      runner.requestShutdown();
      await queue.waitForIdle();

      if (closePositionsOnShutdown) {
        try {
          const result = await queue.enqueue("emergency_close", () => runner.emergencyClose());
          logger.info("Hedge closed on shutdown", {
            venueHedge: result.venueHedge,
            status: result.outcome?.execution.status ?? "flat",
          });
        } catch (error) {
          logger.error("Emergency close on shutdown failed", toError(error));
        }
      }

      queue.close();
      logger.info("Worker shutdown complete");
    },
  };
};
