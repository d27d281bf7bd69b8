export {
  createHyperliquidVenue,
  type HyperliquidExchangeApi,
  type HyperliquidInfoApi,
  type HyperliquidOrderParams,
  type HyperliquidVenueConfig,
} from "./client";

export { formatPrice, formatSize } from "./format";
