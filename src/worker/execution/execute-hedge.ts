/**
 * Execution safety layer: turns a hedge decision into at most one venue
 * order.
 *
 * Checks run in order, each ending the execution early:
 * 1. Size ceiling (clamp, never reject)
 * 2. Minimum order size (SKIPPED)
 * 3. Daily trade ceiling (REJECTED daily_limit)
 * 4. Market data (FAILED when the venue cannot be read)
 * 5. Margin for the exposure-increasing part (REJECTED insufficient_margin)
 *
 * The order is submitted once. A transport failure ends in FAILED and the
 * caller re-reads the venue before the next decision. A resting order is
 * cancelled and settled against the venue position.
 */

import type { OrderResult } from "@/adapters/venue";
import { clampSize, toOrderSide } from "@/domains/hedging";
import {
  type ExecutionEvent,
  type HedgeExecution,
  type RejectReason,
  createHedgeExecution,
  transitionExecution,
} from "@/domains/state";
import { toError } from "@/lib/logger";

import {
  type ExecuteHedgeParams,
  ExecutionError,
  type ExecutionDeps,
  type ExecutionOutcome,
} from "./types";

const generateExecutionId = (): string => crypto.randomUUID();

/** Venue position changes smaller than this are rounding, not fills */
const FILL_TOLERANCE = 1e-9;

/**
 * Margin needed for the part of the order that grows |hedge|. Reducing
 * orders need none.
 */
export const calculateRequiredMargin = (
  currentHedge: number,
  signedSize: number,
  midPrice: number,
  maxLeverage: number,
): number => {
  const increase = Math.max(0, Math.abs(currentHedge + signedSize) - Math.abs(currentHedge));
  return (increase * midPrice) / maxLeverage;
};

export const calculateLimitPrice = (
  side: HedgeExecution["side"],
  midPrice: number,
  slippageTolerance: number,
): number =>
  side === "BUY" ? midPrice * (1 + slippageTolerance) : midPrice * (1 - slippageTolerance);

export const executeHedgeDecision = async (
  params: ExecuteHedgeParams,
  deps: ExecutionDeps,
): Promise<ExecutionOutcome> => {
  const { decision, hedgeState, symbol, override = false, reduceOnly = false } = params;
  const { venue, config, logger } = deps;
  const now = deps.now ?? ((): Date => new Date());

  const signedSize = clampSize(decision.adjustment, config.maxPositionSize);
  let execution = createHedgeExecution({
    id: (deps.generateId ?? generateExecutionId)(),
    symbol,
    reason: decision.reason,
    requestedAdjustment: decision.adjustment,
    side: toOrderSide(signedSize),
    size: Math.abs(signedSize),
    reduceOnly,
    now: now(),
  });

  const logContext = (): Record<string, unknown> => ({
    executionId: execution.id,
    symbol,
    reason: execution.reason,
    side: execution.side,
    size: execution.size,
    status: execution.status,
  });

  const step = (event: ExecutionEvent): void => {
    const result = transitionExecution(execution, event, now());
    if (!result.ok) {
      throw new ExecutionError(result.error, "INVALID_TRANSITION");
    }
    execution = result.state;
  };

  const finish = (signedFilledSize = 0): ExecutionOutcome => ({ execution, signedFilledSize });

  const reject = (reason: RejectReason, message: string): ExecutionOutcome => {
    step({ type: "REJECT", reason, message });
    logger.warn("Hedge execution rejected", { ...logContext(), rejectReason: reason, message });
    return finish();
  };

  const fail = (operation: string, error: unknown): ExecutionOutcome => {
    const cause = toError(error);
    step({ type: "FAIL", error: `${operation}: ${cause.message}` });
    logger.error("Hedge execution failed", cause, { ...logContext(), operation });
    return finish();
  };

  const fill = (
    orderId: string | null,
    filledSize: number,
    avgPrice: number | null,
    partial: boolean,
  ): ExecutionOutcome => {
    step({ type: "FILL", orderId, filledSize, avgPrice });
    logger.info("Hedge order filled", { ...logContext(), orderId, filledSize, avgPrice, partial });
    return finish(execution.side === "BUY" ? filledSize : -filledSize);
  };

  /**
   * An order that rests may fill in part before the cancel lands, and the
   * venue does not always report it. The venue position after the cancel is
   * the record of what filled.
   */
  const settleRestingOrder = async (order: OrderResult): Promise<ExecutionOutcome> => {
    let venueHedge: number;
    try {
      await venue.cancelAllOrders(symbol);
      venueHedge = (await venue.getHedgePosition(symbol)).size;
    } catch (error) {
      return fail("settle resting order", error);
    }

    const moved = venueHedge - hedgeState.currentHedge;
    if (Math.abs(moved) < FILL_TOLERANCE) {
      return reject("not_filled", order.message ?? "Order resting without fill");
    }

    const direction = execution.side === "BUY" ? 1 : -1;
    const filledSize = Math.abs(moved);
    if (Math.sign(moved) !== direction || filledSize > execution.size + FILL_TOLERANCE) {
      return fail(
        "settle resting order",
        new Error(`Venue hedge ${venueHedge} does not follow from ${hedgeState.currentHedge}`),
      );
    }
    return fill(order.orderId, Math.min(filledSize, execution.size), order.avgPrice, true);
  };

  if (Math.abs(signedSize) !== Math.abs(decision.adjustment)) {
    logger.warn("Order size capped at maxPositionSize", {
      ...logContext(),
      requestedAdjustment: decision.adjustment,
      maxPositionSize: config.maxPositionSize,
    });
  }

  // Emergency closes are exempt from the minimum but still need a size
  const exemptFromMinimum = decision.reason === "emergency_close";
  if (execution.size === 0 || (!exemptFromMinimum && execution.size < config.minOrderSize)) {
    step({
      type: "SKIP",
      message: `Order size ${execution.size} is below minimum ${config.minOrderSize}`,
    });
    logger.info("Hedge execution skipped", logContext());
    return finish();
  }

  if (hedgeState.dailyTradeCount >= config.maxDailyTrades && !override) {
    return reject(
      "daily_limit",
      `Daily trade limit reached (${hedgeState.dailyTradeCount}/${config.maxDailyTrades})`,
    );
  }

  let midPrice: number;
  let availableMargin: number;
  try {
    const [mid, account] = await Promise.all([
      venue.getMidPrice(symbol),
      venue.getAccountState(),
    ]);
    midPrice = mid;
    availableMargin = account.availableMarginQuote;
  } catch (error) {
    return fail("market data", error);
  }

  const requiredMargin = calculateRequiredMargin(
    hedgeState.currentHedge,
    signedSize,
    midPrice,
    config.maxLeverage,
  );
  if (requiredMargin > availableMargin) {
    return reject(
      "insufficient_margin",
      `Required margin ${requiredMargin} exceeds available ${availableMargin}`,
    );
  }

  const limitPrice = calculateLimitPrice(execution.side, midPrice, config.slippageTolerance);
  step({ type: "VALIDATE", limitPrice, midPrice });
  step({ type: "SUBMIT" });

  logger.info("Submitting hedge order", {
    ...logContext(),
    midPrice,
    limitPrice,
    timeInForce: config.timeInForce,
    reduceOnly,
  });

  let order: OrderResult;
  try {
    order = await venue.submitLimitOrder({
      symbol,
      side: execution.side,
      size: execution.size,
      limitPrice,
      timeInForce: config.timeInForce,
      reduceOnly,
    });
  } catch (error) {
    return fail("submit order", error);
  }

  if (order.status === "RESTING") {
    return settleRestingOrder(order);
  }

  if (order.filledSize > 0) {
    return fill(order.orderId, order.filledSize, order.avgPrice, order.status === "PARTIALLY_FILLED");
  }

  if (order.status === "REJECTED") {
    return reject("venue_rejected", order.message ?? "Order rejected by venue");
  }

  return reject("not_filled", order.message ?? `Order ${order.status.toLowerCase()} without fill`);
};
