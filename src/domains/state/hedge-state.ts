/**
 * HedgeState: the hedger's view of its venue position and daily trade
 * accounting.
 *
 * Owned by the cycle runner and replaced only through the reducers below,
 * each applied to a confirmed outcome (fill, venue read, day change).
 */

import * as v from "valibot";

export interface HedgeState {
  /** Signed hedge size in base units; positive is long */
  currentHedge: number;
  /** Aggregate LP delta seen by the last assessment */
  lastLpDelta: number;
  /** Executed trades in `tradingDay` */
  dailyTradeCount: number;
  /** UTC day, YYYY-MM-DD */
  tradingDay: string;
  /** The last execution failed ambiguously; re-read the venue before deciding */
  pendingReconcile: boolean;
}

export const toTradingDay = (now: Date): string => now.toISOString().slice(0, 10);

export const createHedgeState = (now: Date, currentHedge = 0): HedgeState => ({
  currentHedge,
  lastLpDelta: 0,
  dailyTradeCount: 0,
  tradingDay: toTradingDay(now),
  pendingReconcile: false,
});

/**
 * Count a fill and move the hedge by the signed filled size.
 */
export const applyFill = (state: HedgeState, signedFilledSize: number): HedgeState => ({
  ...state,
  currentHedge: state.currentHedge + signedFilledSize,
  dailyTradeCount: state.dailyTradeCount + 1,
});

/**
 * Reset the trade count when the UTC day has changed. Same-day calls
 * return the state unchanged, so the reset happens once per day.
 */
export const rollTradingDay = (state: HedgeState, now: Date): HedgeState => {
  const tradingDay = toTradingDay(now);
  if (tradingDay === state.tradingDay) {
    return state;
  }
  return { ...state, tradingDay, dailyTradeCount: 0 };
};

/**
 * Adopt the venue's position as the hedge and clear the reconcile flag.
 */
export const reconcileHedge = (state: HedgeState, venueHedge: number): HedgeState => ({
  ...state,
  currentHedge: venueHedge,
  pendingReconcile: false,
});

export const markPendingReconcile = (state: HedgeState): HedgeState => ({
  ...state,
  pendingReconcile: true,
});

export const recordLpDelta = (state: HedgeState, lpDelta: number): HedgeState => ({
  ...state,
  lastLpDelta: lpDelta,
});

export const hedgeStateSchema = v.object({
  currentHedge: v.number(),
  lastLpDelta: v.number(),
  dailyTradeCount: v.pipe(v.number(), v.integer(), v.minValue(0)),
  tradingDay: v.pipe(v.string(), v.isoDate()),
  pendingReconcile: v.boolean(),
});

export const isHedgeState = (value: unknown): value is HedgeState =>
  v.is(hedgeStateSchema, value);
