/**
 * Tick and sqrt-price conversions for concentrated-liquidity pools.
 *
 * Output prices are human units of token1 per token0.
 */

const TICK_BASE = 1.0001;

const Q96 = 2 ** 96;

/**
 * `1.0001^tick`, rescaled from raw to human units.
 *
 * @example
 * ```typescript
 * tickToPrice(0, 18, 18); // 1
 * tickToPrice(-200000, 18, 6); // ~2061 (WETH/USDC)
 * ```
 */
export const tickToPrice = (tick: number, decimals0: number, decimals1: number): number =>
  TICK_BASE ** tick * 10 ** (decimals0 - decimals1);

export const sqrtPriceX96ToPrice = (
  sqrtPriceX96: bigint,
  decimals0: number,
  decimals1: number,
): number => {
  const sqrtPrice = Number(sqrtPriceX96) / Q96;
  return sqrtPrice * sqrtPrice * 10 ** (decimals0 - decimals1);
};

/**
 * Greatest tick whose price does not exceed `price`.
 * Returns null for non-positive or non-finite prices.
 */
export const priceToTick = (price: number, decimals0: number, decimals1: number): number | null => {
  if (!Number.isFinite(price) || price <= 0) return null;
  const rawPrice = price / 10 ** (decimals0 - decimals1);
  // Absorb float error so exact tick prices map back to their own tick
  return Math.floor(Math.log(rawPrice) / Math.log(TICK_BASE) + 1e-9);
};
