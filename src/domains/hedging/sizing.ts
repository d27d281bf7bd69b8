/**
 * Hedge sizing.
 *
 * The adjustment is derived from LP delta and the current hedge
 * separately; passing an already-netted figure as `lpDelta` would count
 * the hedge twice.
 */

import type {
  HedgeAdjustment,
  HedgeDecision,
  HedgeSizingInput,
  OrderSide,
} from "./types";

export const clampSize = (size: number, maxSize: number): number =>
  Math.max(-maxSize, Math.min(maxSize, size));

/**
 * Adjustment that brings `lpDelta + currentHedge` to `targetDelta`.
 *
 * No action inside the deadband (`|netExposure| < deltaThreshold`).
 *
 * @example
 * ```typescript
 * calculateHedgeAdjustment({
 *   lpDelta: 0.2,
 *   currentHedge: -0.15,
 *   deltaThreshold: 0.01,
 *   maxPositionSize: 10,
 * }); // { action: "adjust", adjustment: -0.05, ... }
 * ```
 */
export const calculateHedgeAdjustment = (input: HedgeSizingInput): HedgeDecision => {
  const {
    lpDelta,
    currentHedge,
    targetDelta = 0,
    deltaThreshold,
    maxPositionSize,
    rebalanceRequested = false,
  } = input;

  const netExposure = lpDelta + currentHedge - targetDelta;

  if (Math.abs(netExposure) < deltaThreshold) {
    return { action: "none", netExposure };
  }

  const required = targetDelta - (lpDelta + currentHedge);
  const adjustment = clampSize(required, maxPositionSize);

  return {
    action: "adjust",
    adjustment,
    targetDelta,
    netExposure,
    reason: rebalanceRequested ? "rebalance" : "threshold_breach",
    clamped: adjustment !== required,
  };
};

/**
 * Flatten the hedge. Exempt from the deadband; the execution layer still
 * applies the size ceiling.
 */
export const calculateCloseAdjustment = (currentHedge: number): HedgeAdjustment => ({
  action: "adjust",
  adjustment: -currentHedge,
  targetDelta: 0,
  netExposure: currentHedge,
  reason: "emergency_close",
  clamped: false,
});

export const toOrderSide = (adjustment: number): OrderSide => (adjustment > 0 ? "BUY" : "SELL");
