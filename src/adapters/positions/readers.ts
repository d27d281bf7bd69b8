/**
 * Protocol-specific contract reads behind one reader interface.
 *
 * Pool addresses never change for a (token0, token1, key) triple, so they
 * are resolved once per process.
 */

import type { Address } from "viem";

import type { BasePublicClient } from "@/lib/chain";

import {
  positionManagerEnumerableAbi,
  slipstreamFactoryAbi,
  slipstreamPoolAbi,
  slipstreamPositionsAbi,
  uniswapV3FactoryAbi,
  uniswapV3PoolAbi,
  uniswapV3PositionsAbi,
} from "./abis";

export type PositionManagerProtocol = "uniswap-v3" | "aerodrome";

export interface RawPosition {
  tokenId: bigint;
  token0: Address;
  token1: Address;
  /** Fee tier (Uniswap V3) or tick spacing (Slipstream) */
  poolKey: number;
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
  tokensOwed0: bigint;
  tokensOwed1: bigint;
}

export interface PoolState {
  sqrtPriceX96: bigint;
  tick: number;
}

export interface PositionManagerReader {
  readonly protocol: PositionManagerProtocol;
  listTokenIds(owner: Address): Promise<bigint[]>;
  readPosition(tokenId: bigint): Promise<RawPosition>;
  readPoolState(token0: Address, token1: Address, poolKey: number): Promise<PoolState>;
}

interface EnumerableReads {
  listTokenIds(owner: Address): Promise<bigint[]>;
  resolvePool(
    token0: Address,
    token1: Address,
    poolKey: number,
    lookup: (factory: Address) => Promise<Address>,
  ): Promise<Address>;
}

const createEnumerableReads = (client: BasePublicClient, manager: Address): EnumerableReads => {
  let factory: Address | null = null;
  const pools = new Map<string, Address>();

  return {
    listTokenIds: async (owner) => {
      const balance = await client.readContract({
        address: manager,
        abi: positionManagerEnumerableAbi,
        functionName: "balanceOf",
        args: [owner],
      });
      const indexes = Array.from({ length: Number(balance) }, (_, index) => BigInt(index));
      return Promise.all(
        indexes.map((index) =>
          client.readContract({
            address: manager,
            abi: positionManagerEnumerableAbi,
            functionName: "tokenOfOwnerByIndex",
            args: [owner, index],
          }),
        ),
      );
    },

    resolvePool: async (token0, token1, poolKey, lookup) => {
      const key = `${token0.toLowerCase()}:${token1.toLowerCase()}:${poolKey}`;
      const cached = pools.get(key);
      if (cached) {
        return cached;
      }
      if (!factory) {
        factory = await client.readContract({
          address: manager,
          abi: positionManagerEnumerableAbi,
          functionName: "factory",
        });
      }
      const pool = await lookup(factory);
      pools.set(key, pool);
      return pool;
    },
  };
};

export const createUniswapV3Reader = (
  client: BasePublicClient,
  manager: Address,
): PositionManagerReader => {
  const enumerable = createEnumerableReads(client, manager);

  return {
    protocol: "uniswap-v3",
    listTokenIds: enumerable.listTokenIds,

    readPosition: async (tokenId) => {
      const [, , token0, token1, fee, tickLower, tickUpper, liquidity, , , owed0, owed1] =
        await client.readContract({
          address: manager,
          abi: uniswapV3PositionsAbi,
          functionName: "positions",
          args: [tokenId],
        });
      return {
        tokenId,
        token0,
        token1,
        poolKey: fee,
        tickLower,
        tickUpper,
        liquidity,
        tokensOwed0: owed0,
        tokensOwed1: owed1,
      };
    },

    readPoolState: async (token0, token1, fee) => {
      const pool = await enumerable.resolvePool(token0, token1, fee, (factory) =>
        client.readContract({
          address: factory,
          abi: uniswapV3FactoryAbi,
          functionName: "getPool",
          args: [token0, token1, fee],
        }),
      );
      const [sqrtPriceX96, tick] = await client.readContract({
        address: pool,
        abi: uniswapV3PoolAbi,
        functionName: "slot0",
      });
      return { sqrtPriceX96, tick };
    },
  };
};

export const createAerodromeReader = (
  client: BasePublicClient,
  manager: Address,
): PositionManagerReader => {
  const enumerable = createEnumerableReads(client, manager);

  return {
    protocol: "aerodrome",
    listTokenIds: enumerable.listTokenIds,

    readPosition: async (tokenId) => {
      const [, , token0, token1, tickSpacing, tickLower, tickUpper, liquidity, , , owed0, owed1] =
        await client.readContract({
          address: manager,
          abi: slipstreamPositionsAbi,
          functionName: "positions",
          args: [tokenId],
        });
      return {
        tokenId,
        token0,
        token1,
        poolKey: tickSpacing,
        tickLower,
        tickUpper,
        liquidity,
        tokensOwed0: owed0,
        tokensOwed1: owed1,
      };
    },

    readPoolState: async (token0, token1, tickSpacing) => {
      const pool = await enumerable.resolvePool(token0, token1, tickSpacing, (factory) =>
        client.readContract({
          address: factory,
          abi: slipstreamFactoryAbi,
          functionName: "getPool",
          args: [token0, token1, tickSpacing],
        }),
      );
      const [sqrtPriceX96, tick] = await client.readContract({
        address: pool,
        abi: slipstreamPoolAbi,
        functionName: "slot0",
      });
      return { sqrtPriceX96, tick };
    },
  };
};
