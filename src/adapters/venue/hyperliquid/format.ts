/**
 * Order wire formatting. Perp sizes are rounded to the asset's
 * `szDecimals`; prices to five significant figures and at most
 * `6 - szDecimals` decimals.
 */

const MAX_PERP_DECIMALS = 6;
const PRICE_SIGNIFICANT_FIGURES = 5;

export const formatSize = (size: number, szDecimals: number): string =>
  String(Number(size.toFixed(szDecimals)));

export const formatPrice = (price: number, szDecimals: number): string => {
  const maxDecimals = Math.max(0, MAX_PERP_DECIMALS - szDecimals);
  const significant = Number(price.toPrecision(PRICE_SIGNIFICANT_FIGURES));
  return String(Number(significant.toFixed(maxDecimals)));
};
