/**
 * Risk level classification.
 *
 * Each dimension escalates independently, so the result is the most severe
 * level any single trigger reaches. The level depends on the current
 * cycle's metrics only.
 */

import type { RiskThresholds } from "./config";
import type { RiskClassification, RiskClassificationInput, RiskLevel } from "./types";
import { escalateRiskLevel } from "./types";

const formatPercent = (fraction: number): string => `${(fraction * 100).toFixed(2)}%`;

/**
 * Triggers per dimension (HIGH takes precedence over MEDIUM):
 * - impermanent loss above `highImpermanentLoss` / `moderateImpermanentLoss`
 * - delta ratio above `highDeltaRatio` / `moderateDeltaRatio`
 * - net PnL below `-highLossRatio * value` / below zero
 */
export const classifyRisk = (
  input: RiskClassificationInput,
  thresholds: RiskThresholds,
): RiskClassification => {
  const { impermanentLoss, deltaRatio, netPnlQuote, valueQuote } = input;
  const reasons: string[] = [];
  let level: RiskLevel = "LOW";

  if (impermanentLoss > thresholds.highImpermanentLoss) {
    reasons.push(
      `Impermanent loss ${formatPercent(impermanentLoss)} exceeds ${formatPercent(thresholds.highImpermanentLoss)}`,
    );
    level = escalateRiskLevel(level, "HIGH");
  } else if (impermanentLoss > thresholds.moderateImpermanentLoss) {
    reasons.push(
      `Impermanent loss ${formatPercent(impermanentLoss)} exceeds ${formatPercent(thresholds.moderateImpermanentLoss)}`,
    );
    level = escalateRiskLevel(level, "MEDIUM");
  }

  if (deltaRatio > thresholds.highDeltaRatio) {
    reasons.push(`Delta ratio ${deltaRatio.toFixed(4)} exceeds ${thresholds.highDeltaRatio}`);
    level = escalateRiskLevel(level, "HIGH");
  } else if (deltaRatio > thresholds.moderateDeltaRatio) {
    reasons.push(`Delta ratio ${deltaRatio.toFixed(4)} exceeds ${thresholds.moderateDeltaRatio}`);
    level = escalateRiskLevel(level, "MEDIUM");
  }

  if (netPnlQuote < -thresholds.highLossRatio * valueQuote) {
    reasons.push(`Net loss exceeds ${formatPercent(thresholds.highLossRatio)} of position value`);
    level = escalateRiskLevel(level, "HIGH");
  } else if (netPnlQuote < 0) {
    reasons.push("Fees do not cover impermanent loss");
    level = escalateRiskLevel(level, "MEDIUM");
  }

  return { level, reasons };
};
