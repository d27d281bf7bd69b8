/**
 * Venue configuration validation schemas.
 */

import * as v from "valibot";

export const privateKeySchema = v.custom<`0x${string}`>(
  (input) => typeof input === "string" && /^0x[0-9a-fA-F]{64}$/.test(input),
  "Expected a 0x-prefixed 32-byte hex private key",
);

export const VenueConfigSchema = v.variant("venue", [
  v.object({
    venue: v.literal("paper"),
    initialMarginQuote: v.pipe(v.number(), v.gtValue(0)),
    maxLeverage: v.optional(v.pipe(v.number(), v.gtValue(0)), 1),
  }),
  v.object({
    venue: v.literal("hyperliquid"),
    privateKey: privateKeySchema,
    testnet: v.boolean(),
  }),
]);

export type VenueConfig = v.InferOutput<typeof VenueConfigSchema>;

export const parseVenueConfig = (config: unknown): VenueConfig =>
  v.parse(VenueConfigSchema, config);

export const isVenueConfig = (value: unknown): value is VenueConfig =>
  v.is(VenueConfigSchema, value);
