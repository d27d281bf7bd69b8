/**
 * Hedge decision types.
 *
 * Sizes are signed base-asset units: positive buys (adds long exposure),
 * negative sells (adds short exposure).
 */

export type HedgeReason = "threshold_breach" | "rebalance" | "emergency_close";

export type OrderSide = "BUY" | "SELL";

export interface HedgeAdjustment {
  action: "adjust";
  adjustment: number;
  targetDelta: number;
  /** lpDelta + currentHedge - targetDelta, before the adjustment */
  netExposure: number;
  reason: HedgeReason;
  /** The size ceiling cut the adjustment */
  clamped: boolean;
}

export interface NoHedgeAction {
  action: "none";
  netExposure: number;
}

export type HedgeDecision = HedgeAdjustment | NoHedgeAction;

export interface HedgeSizingInput {
  /** Aggregate LP delta, never netted against the hedge */
  lpDelta: number;
  currentHedge: number;
  targetDelta?: number;
  deltaThreshold: number;
  maxPositionSize: number;
  rebalanceRequested?: boolean;
}
