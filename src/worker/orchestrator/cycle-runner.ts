/**
 * Cycle runner: the hedger's control loop body.
 *
 * One cycle walks IDLE -> FETCHING -> ASSESSING -> DECIDING ->
 * [EXECUTING] -> REPORTING -> IDLE. The runner owns HedgeState and
 * replaces it only through the state reducers. Shutdown is honoured at
 * phase boundaries; an order already in EXECUTING is allowed to finish.
 */

import { fetchAllPositions } from "@/adapters/positions";
import { type HedgeDecision, calculateHedgeAdjustment } from "@/domains/hedging";
import type { Position } from "@/domains/position";
import {
  type RiskMetrics,
  type RiskSummary,
  assessPosition as defaultAssessPosition,
  buildRiskReport,
  summarizeRisk,
} from "@/domains/risk";
import {
  type CyclePhase,
  type HedgeExecution,
  type HedgeState,
  applyFill,
  createHedgeState,
  markPendingReconcile,
  reconcileHedge,
  recordLpDelta,
  rollTradingDay,
  transitionCycle,
} from "@/domains/state";
import { toError } from "@/lib/logger";

import {
  type EmergencyCloseResult,
  type ExecutionDeps,
  type ExecutionOutcome,
  emergencyClose as runEmergencyClose,
  executeHedgeDecision,
} from "../execution";
import {
  type CycleReport,
  CycleError,
  type CycleRunner,
  type CycleRunnerDeps,
  type EmergencyCloseOptions,
} from "./types";

interface CycleContext {
  cycle: number;
  startedAt: Date;
  failedSources: string[];
  metrics: RiskMetrics[];
  summary: RiskSummary | null;
  decision: HedgeDecision | null;
  execution: HedgeExecution | null;
}

export const createCycleRunner = (deps: CycleRunnerDeps): CycleRunner => {
  const { sources, owner, venue, repository, config, symbol, logger, metrics } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const assess = deps.assessPosition ?? defaultAssessPosition;

  const executionDeps: ExecutionDeps = {
    venue,
    config,
    logger,
    now,
    generateId: deps.generateId,
  };

  let hedgeState: HedgeState = {
    ...createHedgeState(now()),
    dailyTradeCount: deps.initialDailyTradeCount ?? 0,
  };
  let phase: CyclePhase = "IDLE";
  let lastReport: CycleReport | null = null;
  let cycleCount = 0;
  // The venue hedge has not been read yet
  let reconciled = false;
  let shutdownRequested = false;
  const shutdownController = new AbortController();
  /** First price seen per position id, the reference for impermanent loss */
  const entryPrices = new Map<string, number>();

  const move = (next: CyclePhase): void => {
    const result = transitionCycle(phase, next);
    if (!result.ok) {
      throw new CycleError(result.error, "INVALID_TRANSITION");
    }
    phase = result.state;
  };

  /** Enter `next` unless shutdown was requested; returns false when stopped */
  const advance = (next: CyclePhase): boolean => {
    if (shutdownRequested) {
      move("SHUTTING_DOWN");
      logger.info("Cycle stopped for shutdown", { phase: next });
      return false;
    }
    move(next);
    return true;
  };

  const recordExecution = async (execution: HedgeExecution): Promise<void> => {
    metrics?.recordExecution(execution);
    try {
      await repository.save(execution);
    } catch (error) {
      logger.error("Failed to record hedge execution", toError(error), {
        executionId: execution.id,
        status: execution.status,
      });
    }
  };

  const applyOutcome = (outcome: ExecutionOutcome): void => {
    const { execution } = outcome;
    if (execution.status === "FILLED") {
      hedgeState = applyFill(hedgeState, outcome.signedFilledSize);
    } else if (execution.status === "FAILED") {
      hedgeState = markPendingReconcile(hedgeState);
    }
  };

  const entryPriceFor = (position: Position): number => {
    if (position.entryPrice !== undefined && position.entryPrice > 0) {
      return position.entryPrice;
    }
    const known = entryPrices.get(position.id);
    if (known !== undefined) {
      return known;
    }
    if (position.price > 0) {
      entryPrices.set(position.id, position.price);
    }
    return position.price;
  };

  const pruneEntryPrices = (positions: readonly Position[]): void => {
    const live = new Set(positions.map((position) => position.id));
    for (const id of entryPrices.keys()) {
      if (!live.has(id)) {
        entryPrices.delete(id);
      }
    }
  };

  const buildReport = (context: CycleContext, abortReason: string | null): CycleReport => {
    const finishedAt = now();
    const { summary, execution } = context;
    const aggregateDelta = summary?.aggregateDelta ?? 0;
    return {
      cycle: context.cycle,
      status: abortReason === null ? "completed" : "aborted",
      abortReason,
      startedAt: context.startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - context.startedAt.getTime(),
      positionCount: summary?.positionCount ?? 0,
      failedSources: context.failedSources,
      totalValueQuote: summary?.totalValueQuote ?? 0,
      totalImpermanentLossQuote: summary?.totalImpermanentLossQuote ?? 0,
      totalFeesQuote: summary?.totalFeesQuote ?? 0,
      totalNetPnlQuote: summary?.totalNetPnlQuote ?? 0,
      highestRiskLevel: summary?.highestRiskLevel ?? "LOW",
      aggregateDelta,
      currentHedge: hedgeState.currentHedge,
      netExposure: aggregateDelta + hedgeState.currentHedge,
      hedgesExecuted: execution?.status === "FILLED" ? 1 : 0,
      dailyTradeCount: hedgeState.dailyTradeCount,
      decision: context.decision,
      execution: execution
        ? {
            id: execution.id,
            status: execution.status,
            rejectReason: execution.rejectReason,
            filledSize: execution.filledSize,
            message: execution.message,
          }
        : null,
      positions: context.metrics.map(buildRiskReport),
    };
  };

  const publish = (report: CycleReport): CycleReport => {
    lastReport = report;
    metrics?.recordCycle(report);
    return report;
  };

  const abort = (context: CycleContext, reason: string): CycleReport => {
    if (phase === "FETCHING") {
      move(shutdownRequested ? "SHUTTING_DOWN" : "IDLE");
    }
    return publish(buildReport(context, reason));
  };

  const reconcileWithVenue = async (): Promise<void> => {
    const position = await venue.getHedgePosition(symbol);
    if (position.size !== hedgeState.currentHedge) {
      logger.warn("Hedge differs from venue; adopting venue position", {
        symbol,
        local: hedgeState.currentHedge,
        venue: position.size,
      });
    }
    hedgeState = reconcileHedge(hedgeState, position.size);
    reconciled = true;
  };

  const runPhases = async (context: CycleContext): Promise<CycleReport | null> => {
    hedgeState = rollTradingDay(hedgeState, context.startedAt);

    // FETCHING
    if (!advance("FETCHING")) {
      return null;
    }
    const fetched = await fetchAllPositions(sources, owner, {
      logger,
      maxAttempts: deps.fetchRetry?.maxAttempts,
      backoff: deps.fetchRetry?.backoff,
      signal: shutdownController.signal,
    });
    context.failedSources = fetched.failures.map((failure) => failure.source);

    if (fetched.succeeded === 0) {
      logger.error("No position source answered; cycle aborted", undefined, {
        cycle: context.cycle,
        failedSources: context.failedSources,
      });
      return abort(context, "all_sources_failed");
    }

    if (hedgeState.pendingReconcile || !reconciled) {
      try {
        await reconcileWithVenue();
      } catch (error) {
        logger.error("Venue position read failed; cycle aborted", toError(error), {
          cycle: context.cycle,
          symbol,
        });
        return abort(context, "venue_unavailable");
      }
    }

    // ASSESSING
    if (!advance("ASSESSING")) {
      return null;
    }
    pruneEntryPrices(fetched.positions);
    context.metrics = fetched.positions.map((position) =>
      assess(position, {
        entryPrice: entryPriceFor(position),
        volatility: config.volatility,
        config,
        logger,
      }),
    );
    const summary = summarizeRisk(context.metrics);
    context.summary = summary;
    hedgeState = recordLpDelta(hedgeState, summary.aggregateDelta);
    deps.onAssessed?.(context.metrics);

    for (const entry of context.metrics) {
      if (entry.riskLevel === "HIGH") {
        logger.warn("High risk position", { ...buildRiskReport(entry) });
      }
    }

    // DECIDING
    if (!advance("DECIDING")) {
      return null;
    }
    const decision = calculateHedgeAdjustment({
      lpDelta: summary.aggregateDelta,
      currentHedge: hedgeState.currentHedge,
      targetDelta: config.targetDelta,
      deltaThreshold: config.deltaThreshold,
      maxPositionSize: config.maxPositionSize,
      rebalanceRequested: summary.rebalanceRequested,
    });
    context.decision = decision;

    if (decision.action === "adjust") {
      // EXECUTING
      if (!advance("EXECUTING")) {
        return null;
      }
      hedgeState = rollTradingDay(hedgeState, now());
      const outcome = await executeHedgeDecision(
        { decision, hedgeState, symbol },
        executionDeps,
      );
      applyOutcome(outcome);
      context.execution = outcome.execution;
      await recordExecution(outcome.execution);

      if (outcome.execution.status === "REJECTED" || outcome.execution.status === "SKIPPED") {
        logger.warn("Hedge not executed", {
          cycle: context.cycle,
          status: outcome.execution.status,
          rejectReason: outcome.execution.rejectReason,
          message: outcome.execution.message,
          summary,
          positions: context.metrics.map(buildRiskReport),
        });
      }
    } else {
      logger.debug("Net exposure within deadband", {
        netExposure: decision.netExposure,
        deltaThreshold: config.deltaThreshold,
      });
    }

    // REPORTING
    move("REPORTING");
    const report = publish(buildReport(context, null));
    logger.info("Cycle report", {
      cycle: report.cycle,
      positions: report.positionCount,
      failedSources: report.failedSources,
      totalValueQuote: report.totalValueQuote,
      totalImpermanentLossQuote: report.totalImpermanentLossQuote,
      totalFeesQuote: report.totalFeesQuote,
      totalNetPnlQuote: report.totalNetPnlQuote,
      highestRiskLevel: report.highestRiskLevel,
      aggregateDelta: report.aggregateDelta,
      currentHedge: report.currentHedge,
      netExposure: report.netExposure,
      hedgesExecuted: report.hedgesExecuted,
      dailyTradeCount: report.dailyTradeCount,
    });

    advance("IDLE");
    return report;
  };

  return {
    runCycle: async (): Promise<CycleReport | null> => {
      if (shutdownRequested) {
        logger.debug("Shutdown requested; cycle not started");
        return null;
      }
      if (phase !== "IDLE") {
        throw new CycleError(`Cycle already running in phase ${phase}`, "INVALID_TRANSITION");
      }

      cycleCount += 1;
      const context: CycleContext = {
        cycle: cycleCount,
        startedAt: now(),
        failedSources: [],
        metrics: [],
        summary: null,
        decision: null,
        execution: null,
      };

      try {
        return await runPhases(context);
      } catch (error) {
        logger.error("Cycle failed", toError(error), { cycle: context.cycle, phase });
        throw error;
      } finally {
        if (phase !== "IDLE" && phase !== "SHUTTING_DOWN") {
          // Recovery after an unexpected error; the next cycle starts clean
          phase = shutdownRequested ? "SHUTTING_DOWN" : "IDLE";
        }
      }
    },

    emergencyClose: async (options: EmergencyCloseOptions = {}): Promise<EmergencyCloseResult> => {
      hedgeState = rollTradingDay(hedgeState, now());
      const result = await runEmergencyClose(
        { symbol, hedgeState, override: options.override },
        executionDeps,
      );

      hedgeState = reconcileHedge(hedgeState, result.venueHedge);
      if (result.outcome) {
        applyOutcome(result.outcome);
        await recordExecution(result.outcome.execution);
      }
      reconciled = true;
      return result;
    },

    requestShutdown: (): void => {
      if (shutdownRequested) {
        return;
      }
      shutdownRequested = true;
      shutdownController.abort();
      logger.info("Shutdown requested", { phase });
      if (phase === "IDLE") {
        move("SHUTTING_DOWN");
      }
    },

    getHedgeState: (): HedgeState => hedgeState,
    getPhase: (): CyclePhase => phase,
    getLastReport: (): CycleReport | null => lastReport,
  };
};
