/**
 * Impermanent loss of a constant-product position relative to holding,
 * as a fraction of the held value.
 */

import type { Logger } from "@/lib/logger";

export interface ConcentratedIlInput {
  currentPrice: number;
  lowerPrice: number;
  upperPrice: number;
  entryPrice: number;
}

/**
 * `|2 * sqrt(r) / (1 + r) - 1|` with `r = current / entry`.
 *
 * @example
 * ```typescript
 * calculateImpermanentLoss(100, 400); // 0.2 (4x price move)
 * ```
 */
export const calculateImpermanentLoss = (entryPrice: number, currentPrice: number): number => {
  if (!(entryPrice > 0) || !(currentPrice > 0)) return 0;
  const ratio = currentPrice / entryPrice;
  return Math.abs((2 * Math.sqrt(ratio)) / (1 + ratio) - 1);
};

/**
 * Range-aware impermanent loss.
 *
 * Inside the range the plain loss is amplified by the concentration factor
 * `2 / (width / mid)`; the result is capped at 1 (total loss of the held
 * value). Out of range the position is single-sided and the plain loss applies.
 */
export const calculateConcentratedImpermanentLoss = (
  input: ConcentratedIlInput,
  logger?: Pick<Logger, "warn">,
): number => {
  const { currentPrice, lowerPrice, upperPrice, entryPrice } = input;

  if (upperPrice <= lowerPrice) {
    logger?.warn("Invalid range for impermanent loss", { lowerPrice, upperPrice });
    return 0;
  }

  const midPrice = (upperPrice + lowerPrice) / 2;
  if (midPrice <= 0) {
    logger?.warn("Non-positive mid price for impermanent loss", { lowerPrice, upperPrice });
    return 0;
  }

  const baseLoss = calculateImpermanentLoss(entryPrice, currentPrice);

  if (currentPrice < lowerPrice || currentPrice > upperPrice) {
    return baseLoss;
  }

  const concentrationFactor = 2 / ((upperPrice - lowerPrice) / midPrice);
  return Math.min(baseLoss * concentrationFactor, 1);
};
