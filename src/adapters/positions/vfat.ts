/**
 * Position source over the vfat.io aggregator API, which reports positions
 * held through Sickle smart accounts.
 */

import * as v from "valibot";
import type { Address } from "viem";

import { addressSchema, type Position } from "@/domains/position";
import type { Logger } from "@/lib/logger";

import { PositionSourceError } from "./errors";
import type { PositionSource } from "./types";

const SOURCE = "vfat";

export const DEFAULT_VFAT_TIMEOUT_MS = 10000;

const numericSchema = v.union([
  v.pipe(v.number(), v.finite()),
  v.pipe(
    v.string(),
    v.nonEmpty(),
    v.transform((value) => Number(value)),
    v.finite(),
  ),
]);

const nonNegativeNumericSchema = v.pipe(numericSchema, v.minValue(0));

const liquiditySchema = v.pipe(
  v.union([v.pipe(v.string(), v.regex(/^\d+$/)), v.pipe(v.number(), v.integer(), v.minValue(0))]),
  v.transform((value) => BigInt(value)),
);

const decimalsSchema = v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(36));

export const vfatPositionSchema = v.object({
  id: v.union([v.string(), v.number()]),
  token0: addressSchema,
  token1: addressSchema,
  token0_symbol: v.optional(v.string(), "TOKEN0"),
  token1_symbol: v.optional(v.string(), "TOKEN1"),
  token0_decimals: v.optional(decimalsSchema, 18),
  token1_decimals: v.optional(decimalsSchema, 18),
  liquidity: liquiditySchema,
  tick_lower: v.pipe(v.number(), v.integer()),
  tick_upper: v.pipe(v.number(), v.integer()),
  current_tick: v.pipe(v.number(), v.integer()),
  price: nonNegativeNumericSchema,
  unclaimed_fees0: v.optional(nonNegativeNumericSchema, 0),
  unclaimed_fees1: v.optional(nonNegativeNumericSchema, 0),
  entry_price: v.optional(v.pipe(numericSchema, v.gtValue(0))),
});

export type VfatPosition = v.InferOutput<typeof vfatPositionSchema>;

export const vfatResponseSchema = v.object({
  positions: v.array(vfatPositionSchema),
});

export const toPosition = (raw: VfatPosition): Position => ({
  id: `${SOURCE}:${raw.id}`,
  protocol: SOURCE,
  token0: { address: raw.token0, symbol: raw.token0_symbol, decimals: raw.token0_decimals },
  token1: { address: raw.token1, symbol: raw.token1_symbol, decimals: raw.token1_decimals },
  liquidity: raw.liquidity,
  tickLower: raw.tick_lower,
  tickUpper: raw.tick_upper,
  currentTick: raw.current_tick,
  price: raw.price,
  unclaimedFees0: raw.unclaimed_fees0,
  unclaimedFees1: raw.unclaimed_fees1,
  entryPrice: raw.entry_price,
});

export interface VfatSourceConfig {
  apiUrl: string;
  logger: Logger;
  timeoutMs?: number;
}

export const createVfatSource = (config: VfatSourceConfig): PositionSource => {
  const { apiUrl, logger, timeoutMs = DEFAULT_VFAT_TIMEOUT_MS } = config;

  return {
    name: SOURCE,

    fetchPositions: async (owner: Address): Promise<Position[]> => {
      const url = `${apiUrl.replace(/\/$/, "")}/positions/${owner}`;

      let res: Response;
      try {
        res = await fetch(url, {
          headers: { accept: "application/json" },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new PositionSourceError("vfat request failed", "HTTP_ERROR", SOURCE, error);
      }

      if (!res.ok) {
        throw new PositionSourceError(
          `vfat positions fetch failed: ${res.status} ${res.statusText}`,
          "HTTP_ERROR",
          SOURCE,
          undefined,
          res.status,
        );
      }

      let data: unknown;
      try {
        data = await res.json();
      } catch (error) {
        throw new PositionSourceError("vfat response is not JSON", "INVALID_RESPONSE", SOURCE, error);
      }

      const result = v.safeParse(vfatResponseSchema, data);
      if (!result.success) {
        logger.warn("Unexpected vfat response", {
          issues: result.issues.map((issue) => issue.message),
        });
        throw new PositionSourceError(
          "vfat response failed validation",
          "INVALID_RESPONSE",
          SOURCE,
          result.issues,
        );
      }

      return result.output.positions.map(toPosition);
    },
  };
};
