/**
 * Execution layer types and errors.
 */

import type { VenueClient } from "@/adapters/venue";
import type { HedgeAdjustment } from "@/domains/hedging";
import type { HedgerConfig } from "@/domains/risk";
import type { HedgeExecution, HedgeState } from "@/domains/state";
import type { Logger } from "@/lib/logger";

/**
 * Subset of the hedger config the safety checks read.
 */
export type ExecutionConfig = Pick<
  HedgerConfig,
  | "maxPositionSize"
  | "minOrderSize"
  | "maxDailyTrades"
  | "slippageTolerance"
  | "maxLeverage"
  | "timeInForce"
>;

export interface ExecuteHedgeParams {
  decision: HedgeAdjustment;
  hedgeState: HedgeState;
  symbol: string;
  /** Bypass the daily trade ceiling */
  override?: boolean;
  reduceOnly?: boolean;
}

export interface ExecutionDeps {
  venue: VenueClient;
  config: ExecutionConfig;
  logger: Logger;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Terminal execution plus the hedge change it produced.
 */
export interface ExecutionOutcome {
  execution: HedgeExecution;
  /** Signed base units actually filled; 0 unless FILLED */
  signedFilledSize: number;
}

export interface EmergencyCloseParams {
  symbol: string;
  hedgeState: HedgeState;
  override?: boolean;
}

export interface EmergencyCloseResult {
  cancelledOrders: number;
  /** Venue hedge read before closing */
  venueHedge: number;
  /** Null when the venue hedge was already flat */
  outcome: ExecutionOutcome | null;
}

export type ExecutionErrorCode = "INVALID_TRANSITION";

export class ExecutionError extends Error {
  public override readonly name = "ExecutionError";

  constructor(
    message: string,
    public readonly code: ExecutionErrorCode,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}
