/**
 * Fee, PnL and value-at-risk figures. All `*Quote` amounts are human units
 * of token1 (the quote token).
 */

const DAYS_PER_YEAR = 365;

export const calculatePositionValue = (amount0: number, amount1: number, price: number): number =>
  amount0 * price + amount1;

export const calculateFeeValue = (fees0: number, fees1: number, price: number): number =>
  fees0 * price + fees1;

/**
 * Fees earned minus the quote value lost to impermanent loss.
 */
export const calculateFeeAdjustedPnl = (
  feesQuote: number,
  impermanentLoss: number,
  valueQuote: number,
): number => feesQuote - impermanentLoss * valueQuote;

/**
 * One-sided normal quantile for the supported confidence levels.
 */
export const getZScore = (confidence: number): number => {
  if (confidence >= 0.99) return 2.33;
  if (confidence >= 0.95) return 1.65;
  return 1.28;
};

const horizonFactor = (horizonDays: number): number =>
  Math.sqrt(Math.max(horizonDays, 0) / DAYS_PER_YEAR);

/**
 * Parametric VaR from annualized volatility.
 *
 * @example
 * ```typescript
 * // 10_000 at 50% vol, 95%, 1 day: 10_000 * 0.5 * 1.65 * sqrt(1/365)
 * calculateValueAtRisk(10_000, 0.5, 0.95, 1); // ~431.8
 * ```
 */
export const calculateValueAtRisk = (
  valueQuote: number,
  volatility: number,
  confidence: number,
  horizonDays: number,
): number => {
  if (!(valueQuote > 0) || !(volatility > 0)) return 0;
  return valueQuote * volatility * getZScore(confidence) * horizonFactor(horizonDays);
};

/**
 * Loss on a two standard deviation adverse move over the horizon.
 */
export const calculateDownsideRisk = (
  valueQuote: number,
  volatility: number,
  horizonDays: number,
): number => {
  if (!(valueQuote > 0) || !(volatility > 0)) return 0;
  return valueQuote * volatility * horizonFactor(horizonDays) * 2;
};
