import { type Address, type Hex, isAddress } from "viem";
import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const numberFromString = v.pipe(v.string(), v.transform(Number), v.number());

const integerFromString = v.pipe(numberFromString, v.integer());

const booleanFromString = v.pipe(
  v.string(),
  v.picklist(["true", "false"]),
  v.transform((value) => value === "true"),
);

const addressSchema = v.custom<Address>(
  (input) => typeof input === "string" && isAddress(input),
  "Expected a 0x-prefixed 20-byte address",
);

const privateKeySchema = v.custom<Hex>(
  (input) => typeof input === "string" && /^0x[0-9a-fA-F]{64}$/.test(input),
  "Expected a 0x-prefixed 32-byte private key",
);

export const envSchema = v.object({
  // Server
  PORT: v.optional(
    v.pipe(integerFromString, v.minValue(1), v.maxValue(65535)),
    "8080",
  ),
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "production"),
  ADMIN_TOKEN: v.optional(v.pipe(v.string(), v.minLength(16))),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Database (audit trail is in-memory when unset)
  DATABASE_URL: v.optional(v.pipe(v.string(), v.minLength(1))),

  // Position sources
  WALLET_ADDRESS: addressSchema,
  RPC_URL: v.optional(v.pipe(v.string(), v.url())),
  UNISWAP_V3_NFT_ADDRESS: v.optional(addressSchema),
  AERODROME_NFT_ADDRESS: v.optional(addressSchema),
  VFAT_API_URL: v.optional(v.pipe(v.string(), v.url())),

  // Venue
  VENUE: v.optional(v.picklist(["paper", "hyperliquid"]), "paper"),
  HYPERLIQUID_PRIVATE_KEY: v.optional(privateKeySchema),
  HYPERLIQUID_TESTNET: v.optional(booleanFromString, "true"),
  PAPER_MARGIN: v.optional(numberFromString, "100000"),

  // Cycle
  UPDATE_INTERVAL_SECONDS: v.optional(v.pipe(integerFromString, v.minValue(1)), "60"),
  HEDGE_SYMBOL: v.optional(v.pipe(v.string(), v.minLength(1)), "ETH"),
  CLOSE_POSITIONS_ON_SHUTDOWN: v.optional(booleanFromString, "false"),

  // Hedging and risk thresholds (positivity is enforced by the hedger config schema)
  TARGET_DELTA: v.optional(numberFromString, "0"),
  DELTA_THRESHOLD: v.optional(numberFromString, "0.1"),
  REBALANCE_THRESHOLD: v.optional(numberFromString, "0.05"),
  MAX_POSITION_SIZE: v.optional(numberFromString, "10"),
  MIN_ORDER_SIZE: v.optional(numberFromString, "0.01"),
  MAX_DAILY_TRADES: v.optional(integerFromString, "100"),
  SLIPPAGE_TOLERANCE: v.optional(numberFromString, "0.005"),
  MAX_LEVERAGE: v.optional(numberFromString, "1"),
  TIME_IN_FORCE: v.optional(v.picklist(["Ioc", "Gtc"]), "Ioc"),
  VAR_CONFIDENCE: v.optional(numberFromString, "0.95"),
  VAR_HORIZON_DAYS: v.optional(numberFromString, "1"),
  VOLATILITY: v.optional(numberFromString, "0.5"),
  MAX_IMPERMANENT_LOSS: v.optional(numberFromString, "0.05"),
  MODERATE_IMPERMANENT_LOSS: v.optional(numberFromString, "0.02"),
  HIGH_DELTA_RATIO: v.optional(numberFromString, "0.5"),
  MAX_LOSS_RATIO: v.optional(numberFromString, "0.02"),
});

export type Env = v.InferOutput<typeof envSchema>;
