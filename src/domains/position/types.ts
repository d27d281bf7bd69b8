/**
 * Concentrated-liquidity position as read from a position source.
 *
 * token0 is the hedged base asset and token1 the quote. Prices are human
 * units of token1 per token0. Positions are rebuilt every cycle and never
 * mutated.
 */

import { type Address, isAddress } from "viem";
import * as v from "valibot";

export type PositionProtocol = "uniswap-v3" | "aerodrome" | "vfat";

export interface TokenInfo {
  address: Address;
  symbol: string;
  decimals: number;
}

export interface Position {
  /** Unique across sources, e.g. "uniswap-v3:1234" */
  id: string;
  protocol: PositionProtocol;
  token0: TokenInfo;
  token1: TokenInfo;
  /** Raw pool liquidity */
  liquidity: bigint;
  tickLower: number;
  tickUpper: number;
  currentTick: number;
  price: number;
  unclaimedFees0: number;
  unclaimedFees1: number;
  /** Price at which the position was opened, when the source knows it */
  entryPrice?: number;
}

// --- Valibot Schemas ---

export const positionProtocolSchema = v.picklist(["uniswap-v3", "aerodrome", "vfat"] as const);

export const addressSchema = v.custom<Address>(
  (input) => typeof input === "string" && isAddress(input),
  "Expected a 0x-prefixed 20-byte address",
);

export const tokenInfoSchema = v.object({
  address: addressSchema,
  symbol: v.pipe(v.string(), v.minLength(1)),
  decimals: v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(36)),
});

const tickSchema = v.pipe(v.number(), v.integer());

const nonNegativeSchema = v.pipe(v.number(), v.minValue(0));

export const positionSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  protocol: positionProtocolSchema,
  token0: tokenInfoSchema,
  token1: tokenInfoSchema,
  liquidity: v.pipe(v.bigint(), v.minValue(0n)),
  tickLower: tickSchema,
  tickUpper: tickSchema,
  currentTick: tickSchema,
  price: nonNegativeSchema,
  unclaimedFees0: nonNegativeSchema,
  unclaimedFees1: nonNegativeSchema,
  entryPrice: v.optional(v.pipe(v.number(), v.gtValue(0))),
});

// --- Type Guards ---

export const isPosition = (value: unknown): value is Position => v.is(positionSchema, value);
