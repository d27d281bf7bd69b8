/**
 * Emergency close: flatten the venue hedge regardless of the deadband.
 *
 * Resting orders are cancelled first so nothing fills behind the close.
 * The close is sized from the venue's position, not from HedgeState,
 * and is sent reduce-only.
 */

import { calculateCloseAdjustment } from "@/domains/hedging";

import { executeHedgeDecision } from "./execute-hedge";
import type { EmergencyCloseParams, EmergencyCloseResult, ExecutionDeps } from "./types";

export const emergencyClose = async (
  params: EmergencyCloseParams,
  deps: ExecutionDeps,
): Promise<EmergencyCloseResult> => {
  const { symbol, hedgeState, override = false } = params;
  const { venue, logger } = deps;

  logger.warn("Emergency close started", { symbol, override });

  const cancelledOrders = await venue.cancelAllOrders(symbol);
  const position = await venue.getHedgePosition(symbol);

  if (position.size === 0) {
    logger.info("Emergency close: hedge already flat", { symbol, cancelledOrders });
    return { cancelledOrders, venueHedge: 0, outcome: null };
  }

  const outcome = await executeHedgeDecision(
    {
      decision: calculateCloseAdjustment(position.size),
      hedgeState: { ...hedgeState, currentHedge: position.size },
      symbol,
      override,
      reduceOnly: true,
    },
    deps,
  );

  const remaining = position.size + outcome.signedFilledSize;
  if (outcome.execution.status === "FILLED" && remaining !== 0) {
    logger.warn("Emergency close left a residual hedge", { symbol, remaining });
  }

  logger.info("Emergency close finished", {
    symbol,
    cancelledOrders,
    venueHedge: position.size,
    status: outcome.execution.status,
    filledSize: outcome.execution.filledSize,
  });

  return { cancelledOrders, venueHedge: position.size, outcome };
};
