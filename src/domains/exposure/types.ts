/**
 * Exposure calculator types.
 *
 * Prices are human units of token1 per token0. Amounts are human units of
 * each token. Delta is expressed in token0 (the hedged base asset).
 */

export interface ExposureInput {
  /** Raw pool liquidity L */
  liquidity: number | bigint;
  lowerPrice: number;
  upperPrice: number;
  currentPrice: number;
  decimals0: number;
  decimals1: number;
}

export interface Exposure {
  /** Change of position value per unit of price, in token0 */
  delta: number;
  /** d(delta)/d(price); negative while in range */
  gamma: number;
  amount0: number;
  amount1: number;
}

export type RangeStatus = "BELOW" | "IN_RANGE" | "ABOVE";
