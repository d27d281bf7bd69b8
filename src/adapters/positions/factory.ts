/**
 * Builds the configured position sources.
 */

import type { Address } from "viem";

import type { BasePublicClient } from "@/lib/chain";
import type { Logger } from "@/lib/logger";

import { createPositionManagerSource, createTokenCache } from "./position-manager";
import { createAerodromeReader, createUniswapV3Reader } from "./readers";
import type { PositionSource } from "./types";
import { createVfatSource } from "./vfat";

export interface PositionSourcesConfig {
  uniswapV3PositionManager?: Address;
  aerodromePositionManager?: Address;
  vfatApiUrl?: string;
}

export interface PositionSourcesDependencies {
  client: BasePublicClient;
  logger: Logger;
}

export const createPositionSources = (
  config: PositionSourcesConfig,
  deps: PositionSourcesDependencies,
): PositionSource[] => {
  const { client, logger } = deps;
  const tokenCache = createTokenCache(client);
  const sources: PositionSource[] = [];

  if (config.uniswapV3PositionManager) {
    sources.push(
      createPositionManagerSource({
        reader: createUniswapV3Reader(client, config.uniswapV3PositionManager),
        client,
        logger,
        tokenCache,
      }),
    );
  }

  if (config.aerodromePositionManager) {
    sources.push(
      createPositionManagerSource({
        reader: createAerodromeReader(client, config.aerodromePositionManager),
        client,
        logger,
        tokenCache,
      }),
    );
  }

  if (config.vfatApiUrl) {
    sources.push(createVfatSource({ apiUrl: config.vfatApiUrl, logger }));
  }

  return sources;
};
