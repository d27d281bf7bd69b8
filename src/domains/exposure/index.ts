export type { Exposure, ExposureInput, RangeStatus } from "./types";

export { calculateExposure, getRangeStatus } from "./calculate";

export { priceToTick, sqrtPriceX96ToPrice, tickToPrice } from "./ticks";
