/**
 * Venue client exports.
 */

export type {
  AccountState,
  HedgePosition,
  LimitOrderRequest,
  OrderResult,
  Venue,
  VenueClient,
  VenueOrderStatus,
} from "./types";

export {
  accountStateSchema,
  hedgePositionSchema,
  isAccountState,
  isHedgePosition,
  isOrderResult,
  orderResultSchema,
  venueOrderStatusSchema,
} from "./types";

export { VenueError } from "./errors";
export type { VenueErrorCode } from "./errors";

// Factory function
export { createVenueClient, type VenueDependencies } from "./factory";

// Config validation
export { isVenueConfig, parseVenueConfig, VenueConfigSchema } from "./config";
export type { VenueConfig } from "./config";

// Venue factory functions
export { createPaperVenue } from "./paper";
export type { PaperFill, PaperVenueClient, PaperVenueConfig } from "./paper";
export { createHyperliquidVenue } from "./hyperliquid";
export type { HyperliquidVenueConfig } from "./hyperliquid";
