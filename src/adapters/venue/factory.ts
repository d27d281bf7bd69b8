/**
 * Factory function for creating venue clients.
 */

import type { Logger } from "@/lib/logger";

import type { VenueConfig } from "./config";
import { createHyperliquidVenue } from "./hyperliquid";
import { createPaperVenue } from "./paper";
import type { VenueClient } from "./types";

export interface VenueDependencies {
  logger: Logger;
  /** Mid price source for the paper venue */
  referencePrice?: (symbol: string) => number | undefined;
}

/**
 * Create a venue client based on configuration.
 *
 * @param config - Validated venue configuration
 */
export const createVenueClient = (config: VenueConfig, deps: VenueDependencies): VenueClient => {
  switch (config.venue) {
    case "paper":
      return createPaperVenue({
        initialMarginQuote: config.initialMarginQuote,
        maxLeverage: config.maxLeverage,
        referencePrice: deps.referencePrice,
      });
    case "hyperliquid":
      return createHyperliquidVenue({
        privateKey: config.privateKey,
        testnet: config.testnet,
        logger: deps.logger,
      });
  }
};
