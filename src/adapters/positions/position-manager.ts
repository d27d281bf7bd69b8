/**
 * Position source over a NonfungiblePositionManager (Uniswap V3 or
 * Aerodrome Slipstream).
 *
 * Lists the owner's NFTs, reads each position and its pool's slot0, and
 * resolves token metadata through an LRU cache. Closed positions (zero
 * liquidity) are skipped. Unclaimed fees are the manager's tokensOwed
 * counters.
 */

import { LRUCache } from "lru-cache";
import { type Address, erc20Abi, formatUnits, getAddress } from "viem";

import { sqrtPriceX96ToPrice } from "@/domains/exposure";
import type { Position, TokenInfo } from "@/domains/position";
import type { BasePublicClient } from "@/lib/chain";
import type { Logger } from "@/lib/logger";

import { PositionSourceError } from "./errors";
import type { PositionManagerReader, RawPosition } from "./readers";
import type { PositionSource } from "./types";

export type TokenCache = LRUCache<Address, TokenInfo>;

/**
 * Token metadata cache keyed by checksummed address. Concurrent lookups of
 * the same token share one pair of RPC reads.
 */
export const createTokenCache = (
  client: Pick<BasePublicClient, "readContract">,
  max = 256,
): TokenCache =>
  new LRUCache<Address, TokenInfo>({
    max,
    fetchMethod: async (address) => {
      const [symbol, decimals] = await Promise.all([
        client.readContract({ address, abi: erc20Abi, functionName: "symbol" }),
        client.readContract({ address, abi: erc20Abi, functionName: "decimals" }),
      ]);
      return { address, symbol, decimals };
    },
  });

export interface PositionManagerSourceConfig {
  reader: PositionManagerReader;
  /** Used for ERC-20 metadata reads */
  client: BasePublicClient;
  logger: Logger;
  tokenCache?: TokenCache;
}

export const createPositionManagerSource = (config: PositionManagerSourceConfig): PositionSource => {
  const { reader, client, logger } = config;
  const tokenCache = config.tokenCache ?? createTokenCache(client);
  const name = reader.protocol;

  const readToken = async (address: Address): Promise<TokenInfo> => {
    const token = await tokenCache.fetch(getAddress(address));
    if (!token) {
      throw new Error(`Token metadata unavailable for ${address}`);
    }
    return token;
  };

  const toPosition = async (raw: RawPosition): Promise<Position> => {
    const [token0, token1, pool] = await Promise.all([
      readToken(raw.token0),
      readToken(raw.token1),
      reader.readPoolState(raw.token0, raw.token1, raw.poolKey),
    ]);

    return {
      id: `${name}:${raw.tokenId}`,
      protocol: name,
      token0,
      token1,
      liquidity: raw.liquidity,
      tickLower: raw.tickLower,
      tickUpper: raw.tickUpper,
      currentTick: pool.tick,
      price: sqrtPriceX96ToPrice(pool.sqrtPriceX96, token0.decimals, token1.decimals),
      unclaimedFees0: Number(formatUnits(raw.tokensOwed0, token0.decimals)),
      unclaimedFees1: Number(formatUnits(raw.tokensOwed1, token1.decimals)),
    };
  };

  return {
    name,

    fetchPositions: async (owner: Address): Promise<Position[]> => {
      try {
        const tokenIds = await reader.listTokenIds(owner);
        const raw = await Promise.all(tokenIds.map((tokenId) => reader.readPosition(tokenId)));
        const open = raw.filter((position) => position.liquidity > 0n);

        if (open.length < raw.length) {
          logger.debug("Skipping closed positions", {
            source: name,
            closed: raw.length - open.length,
          });
        }

        return await Promise.all(open.map(toPosition));
      } catch (error) {
        throw new PositionSourceError(`Failed to read ${name} positions`, "RPC_ERROR", name, error);
      }
    },
  };
};
