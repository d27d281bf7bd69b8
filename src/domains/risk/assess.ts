/**
 * Per-position risk assessment: exposure, loss and value metrics, then
 * classification.
 */

import { calculateExposure, tickToPrice } from "@/domains/exposure";
import {
  calculateConcentratedImpermanentLoss,
  calculateDownsideRisk,
  calculateFeeAdjustedPnl,
  calculateFeeValue,
  calculatePositionValue,
  calculateValueAtRisk,
} from "@/domains/metrics";
import type { Position } from "@/domains/position";
import type { Logger } from "@/lib/logger";

import { classifyRisk } from "./classify";
import type { RiskConfig } from "./config";
import type { RiskMetrics } from "./types";

export interface AssessmentContext {
  /** Price the impermanent loss is measured against */
  entryPrice: number;
  /** Annualized volatility estimate */
  volatility: number;
  config: RiskConfig;
  logger?: Pick<Logger, "warn">;
}

/**
 * |delta * price| / value, or 0 for a worthless position.
 */
export const calculateDeltaRatio = (delta: number, price: number, valueQuote: number): number =>
  valueQuote > 0 ? Math.abs(delta * price) / valueQuote : 0;

export const assessPosition = (position: Position, context: AssessmentContext): RiskMetrics => {
  const { entryPrice, volatility, config, logger } = context;
  const { price, token0, token1 } = position;

  if (!(price > 0)) {
    logger?.warn("Position has no usable price", { positionId: position.id, price });
  }

  const lowerPrice = tickToPrice(position.tickLower, token0.decimals, token1.decimals);
  const upperPrice = tickToPrice(position.tickUpper, token0.decimals, token1.decimals);

  const exposure = calculateExposure({
    liquidity: position.liquidity,
    lowerPrice,
    upperPrice,
    currentPrice: price,
    decimals0: token0.decimals,
    decimals1: token1.decimals,
  });

  const valueQuote = calculatePositionValue(exposure.amount0, exposure.amount1, price);
  const impermanentLoss = calculateConcentratedImpermanentLoss(
    { currentPrice: price, lowerPrice, upperPrice, entryPrice },
    logger,
  );
  const feesQuote = calculateFeeValue(position.unclaimedFees0, position.unclaimedFees1, price);
  const netPnlQuote = calculateFeeAdjustedPnl(feesQuote, impermanentLoss, valueQuote);
  const deltaRatio = calculateDeltaRatio(exposure.delta, price, valueQuote);

  const classification = classifyRisk(
    { impermanentLoss, deltaRatio, netPnlQuote, valueQuote },
    config.thresholds,
  );

  return {
    positionId: position.id,
    price,
    delta: exposure.delta,
    gamma: exposure.gamma,
    amount0: exposure.amount0,
    amount1: exposure.amount1,
    valueQuote,
    impermanentLoss,
    impermanentLossQuote: impermanentLoss * valueQuote,
    feesQuote,
    netPnlQuote,
    valueAtRiskQuote: calculateValueAtRisk(
      valueQuote,
      volatility,
      config.varConfidence,
      config.varHorizonDays,
    ),
    downsideRiskQuote: calculateDownsideRisk(valueQuote, volatility, config.varHorizonDays),
    deltaRatio,
    needsRebalance: deltaRatio > config.rebalanceThreshold,
    riskLevel: classification.level,
    reasons: classification.reasons,
  };
};
