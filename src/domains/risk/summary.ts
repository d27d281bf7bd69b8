import type { RiskLevel, RiskMetrics, RiskReport, RiskSummary } from "./types";
import { escalateRiskLevel } from "./types";

/**
 * Aggregate per-position metrics. The aggregate delta is the plain sum of
 * position deltas; hedge exposure is never folded in here. Every position's
 * token0 is taken to be the hedged asset, so pools on other base tokens
 * must not be fed in.
 */
export const summarizeRisk = (metrics: readonly RiskMetrics[]): RiskSummary => {
  let highestRiskLevel: RiskLevel = "LOW";
  let aggregateDelta = 0;
  let totalValueQuote = 0;
  let totalImpermanentLossQuote = 0;
  let totalFeesQuote = 0;
  let totalNetPnlQuote = 0;
  let rebalanceRequested = false;

  for (const entry of metrics) {
    aggregateDelta += entry.delta;
    totalValueQuote += entry.valueQuote;
    totalImpermanentLossQuote += entry.impermanentLossQuote;
    totalFeesQuote += entry.feesQuote;
    totalNetPnlQuote += entry.netPnlQuote;
    highestRiskLevel = escalateRiskLevel(highestRiskLevel, entry.riskLevel);
    rebalanceRequested = rebalanceRequested || entry.needsRebalance;
  }

  return {
    positionCount: metrics.length,
    aggregateDelta,
    totalValueQuote,
    totalImpermanentLossQuote,
    totalFeesQuote,
    totalNetPnlQuote,
    highestRiskLevel,
    rebalanceRequested,
  };
};

export const buildRiskReport = (metrics: RiskMetrics): RiskReport => ({
  positionId: metrics.positionId,
  riskLevel: metrics.riskLevel,
  valueQuote: metrics.valueQuote,
  impermanentLossPercent: metrics.impermanentLoss * 100,
  impermanentLossQuote: metrics.impermanentLossQuote,
  feesQuote: metrics.feesQuote,
  netPnlQuote: metrics.netPnlQuote,
  valueAtRiskQuote: metrics.valueAtRiskQuote,
  downsideRiskQuote: metrics.downsideRiskQuote,
  delta: metrics.delta,
  gamma: metrics.gamma,
  deltaRatio: metrics.deltaRatio,
  needsRebalance: metrics.needsRebalance,
  reasons: metrics.reasons.join("; "),
});
