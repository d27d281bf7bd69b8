/**
 * Delta and gamma of a concentrated-liquidity position.
 *
 * With raw prices P (token1 per token0 in smallest units) and pool
 * liquidity L, the position holds
 *
 *   amount0 = L * (1/sqrt(P) - 1/sqrt(Pb))
 *   amount1 = L * (sqrt(P) - sqrt(Pa))
 *
 * inside [Pa, Pb], all token0 below the range, all token1 above it.
 * Delta is the token0 balance; gamma is its derivative with respect to
 * the human price.
 */

import type { Exposure, ExposureInput, RangeStatus } from "./types";

const ZERO_EXPOSURE: Exposure = { delta: 0, gamma: 0, amount0: 0, amount1: 0 };

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

/**
 * Which side of the range the price sits on. Both edges count as in range.
 */
export const getRangeStatus = (
  currentPrice: number,
  lowerPrice: number,
  upperPrice: number,
): RangeStatus => {
  if (currentPrice < lowerPrice) return "BELOW";
  if (currentPrice > upperPrice) return "ABOVE";
  return "IN_RANGE";
};

/**
 * Degenerate inputs (zero liquidity, non-positive prices, inverted or
 * empty range) produce zero exposure.
 */
export const calculateExposure = (input: ExposureInput): Exposure => {
  const liquidity = Number(input.liquidity);
  const { lowerPrice, upperPrice, currentPrice, decimals0, decimals1 } = input;

  if (
    !isPositiveFinite(liquidity) ||
    !isPositiveFinite(lowerPrice) ||
    !isPositiveFinite(upperPrice) ||
    !isPositiveFinite(currentPrice) ||
    lowerPrice >= upperPrice
  ) {
    return ZERO_EXPOSURE;
  }

  const rawScale = 10 ** (decimals1 - decimals0);
  const scale0 = 10 ** decimals0;
  const scale1 = 10 ** decimals1;

  const sqrtLower = Math.sqrt(lowerPrice * rawScale);
  const sqrtUpper = Math.sqrt(upperPrice * rawScale);

  switch (getRangeStatus(currentPrice, lowerPrice, upperPrice)) {
    case "BELOW": {
      const amount0 = (liquidity * (1 / sqrtLower - 1 / sqrtUpper)) / scale0;
      return { delta: amount0, gamma: 0, amount0, amount1: 0 };
    }
    case "ABOVE": {
      const amount1 = (liquidity * (sqrtUpper - sqrtLower)) / scale1;
      return { delta: 0, gamma: 0, amount0: 0, amount1 };
    }
    case "IN_RANGE": {
      const rawPrice = currentPrice * rawScale;
      const sqrtPrice = Math.sqrt(rawPrice);
      const amount0 = (liquidity * (1 / sqrtPrice - 1 / sqrtUpper)) / scale0;
      const amount1 = (liquidity * (sqrtPrice - sqrtLower)) / scale1;
      // d/dp [L / sqrt(p * s)] / 10^d0 = -(L / 2) * (p * s)^(-3/2) * s / 10^d0
      const gamma = (-(liquidity / 2) * rawPrice ** -1.5 * rawScale) / scale0;
      return { delta: amount0, gamma, amount0, amount1 };
    }
  }
};
