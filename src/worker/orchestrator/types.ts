/**
 * Cycle orchestrator types.
 */

import type { Address } from "viem";

import type { PositionSource } from "@/adapters/positions";
import type { VenueClient } from "@/adapters/venue";
import type { HedgeDecision } from "@/domains/hedging";
import type { Position } from "@/domains/position";
import type {
  AssessmentContext,
  HedgerConfig,
  RiskLevel,
  RiskMetrics,
  RiskReport,
} from "@/domains/risk";
import type {
  CyclePhase,
  ExecutionStatus,
  HedgeExecution,
  HedgeState,
  RejectReason,
} from "@/domains/state";
import type { HedgeExecutionRepository } from "@/lib/db";
import type { Logger } from "@/lib/logger";
import type { BackoffConfig } from "@/lib/resilience";

import type { EmergencyCloseResult } from "../execution";

/**
 * Receives cycle results; the HTTP metrics endpoint implements it.
 */
export interface CycleMetricsSink {
  recordCycle(report: CycleReport): void;
  recordExecution(execution: HedgeExecution): void;
}

export interface CycleRunnerDeps {
  sources: readonly PositionSource[];
  owner: Address;
  venue: VenueClient;
  repository: HedgeExecutionRepository;
  config: HedgerConfig;
  /** Hedged perp symbol, e.g. "ETH" */
  symbol: string;
  logger: Logger;
  metrics?: CycleMetricsSink;
  /** Trades already executed today, restored from the audit trail */
  initialDailyTradeCount?: number;
  fetchRetry?: {
    maxAttempts?: number;
    backoff?: BackoffConfig;
  };
  now?: () => Date;
  generateId?: () => string;
  assessPosition?: (position: Position, context: AssessmentContext) => RiskMetrics;
  /** Called with each cycle's metrics before the decision */
  onAssessed?: (metrics: readonly RiskMetrics[]) => void;
}

export type CycleStatus = "completed" | "aborted";

export interface CycleExecutionSummary {
  id: string;
  status: ExecutionStatus;
  rejectReason: RejectReason | null;
  filledSize: number;
  message: string | null;
}

/**
 * Read-only record of one cycle, logged and published to metrics.
 */
export interface CycleReport {
  cycle: number;
  status: CycleStatus;
  abortReason: string | null;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  positionCount: number;
  failedSources: string[];
  totalValueQuote: number;
  totalImpermanentLossQuote: number;
  totalFeesQuote: number;
  totalNetPnlQuote: number;
  highestRiskLevel: RiskLevel;
  aggregateDelta: number;
  currentHedge: number;
  /** aggregateDelta + currentHedge after any execution */
  netExposure: number;
  hedgesExecuted: number;
  dailyTradeCount: number;
  decision: HedgeDecision | null;
  execution: CycleExecutionSummary | null;
  positions: RiskReport[];
}

export interface EmergencyCloseOptions {
  /** Bypass the daily trade ceiling */
  override?: boolean;
}

export interface CycleRunner {
  /** Null when shutdown was requested before the cycle started */
  runCycle(): Promise<CycleReport | null>;
  emergencyClose(options?: EmergencyCloseOptions): Promise<EmergencyCloseResult>;
  requestShutdown(): void;
  getHedgeState(): HedgeState;
  getPhase(): CyclePhase;
  getLastReport(): CycleReport | null;
}

export class CycleError extends Error {
  public override readonly name = "CycleError";

  constructor(
    message: string,
    public readonly code: "INVALID_TRANSITION",
  ) {
    super(message);
  }
}
