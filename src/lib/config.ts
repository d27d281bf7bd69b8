import type { Address } from "viem";

import type { PositionSourcesConfig } from "@/adapters/positions";
import { type VenueConfig, parseVenueConfig } from "@/adapters/venue";
import { type HedgerConfig, parseHedgerConfig } from "@/domains/risk";

import { DEFAULT_BASE_RPC_URL, UNISWAP_V3_POSITION_MANAGER_BASE } from "./chain";
import type { Env } from "./env";
import type { LogFormat, LogLevel } from "./logger";

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: Env["NODE_ENV"];
    /** Enables the operator routes when set */
    adminToken?: string;
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  database: {
    url?: string;
  };
  chain: {
    rpcUrl: string;
  };
  sources: PositionSourcesConfig & {
    owner: Address;
  };
  venue: VenueConfig;
  worker: {
    intervalMs: number;
    symbol: string;
    closePositionsOnShutdown: boolean;
  };
  hedger: HedgerConfig;
}

export class ConfigError extends Error {
  public readonly code = "INVALID_CONFIG";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const loadVenueConfig = (env: Env): VenueConfig => {
  if (env.VENUE === "paper") {
    return parseVenueConfig({
      venue: "paper",
      initialMarginQuote: env.PAPER_MARGIN,
      maxLeverage: env.MAX_LEVERAGE,
    });
  }
  if (!env.HYPERLIQUID_PRIVATE_KEY) {
    throw new ConfigError("HYPERLIQUID_PRIVATE_KEY is required when VENUE=hyperliquid");
  }
  return parseVenueConfig({
    venue: "hyperliquid",
    privateKey: env.HYPERLIQUID_PRIVATE_KEY,
    testnet: env.HYPERLIQUID_TESTNET,
  });
};

/**
 * Build the typed application config from a validated environment.
 * Throws HedgerConfigError for invalid thresholds and ConfigError for
 * inconsistent settings; both are fatal at startup.
 */
export const loadConfig = (env: Env): AppConfig => ({
  server: {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    adminToken: env.ADMIN_TOKEN,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    format: env.NODE_ENV === "production" ? "json" : "pretty",
  },
  database: {
    url: env.DATABASE_URL,
  },
  chain: {
    rpcUrl: env.RPC_URL ?? DEFAULT_BASE_RPC_URL,
  },
  sources: {
    owner: env.WALLET_ADDRESS,
    uniswapV3PositionManager: env.UNISWAP_V3_NFT_ADDRESS ?? UNISWAP_V3_POSITION_MANAGER_BASE,
    aerodromePositionManager: env.AERODROME_NFT_ADDRESS,
    vfatApiUrl: env.VFAT_API_URL,
  },
  venue: loadVenueConfig(env),
  worker: {
    intervalMs: env.UPDATE_INTERVAL_SECONDS * 1000,
    symbol: env.HEDGE_SYMBOL,
    closePositionsOnShutdown: env.CLOSE_POSITIONS_ON_SHUTDOWN,
  },
  hedger: parseHedgerConfig({
    targetDelta: env.TARGET_DELTA,
    deltaThreshold: env.DELTA_THRESHOLD,
    rebalanceThreshold: env.REBALANCE_THRESHOLD,
    maxPositionSize: env.MAX_POSITION_SIZE,
    minOrderSize: env.MIN_ORDER_SIZE,
    maxDailyTrades: env.MAX_DAILY_TRADES,
    slippageTolerance: env.SLIPPAGE_TOLERANCE,
    maxLeverage: env.MAX_LEVERAGE,
    timeInForce: env.TIME_IN_FORCE,
    varConfidence: env.VAR_CONFIDENCE,
    varHorizonDays: env.VAR_HORIZON_DAYS,
    volatility: env.VOLATILITY,
    thresholds: {
      highImpermanentLoss: env.MAX_IMPERMANENT_LOSS,
      moderateImpermanentLoss: env.MODERATE_IMPERMANENT_LOSS,
      highDeltaRatio: env.HIGH_DELTA_RATIO,
      moderateDeltaRatio: env.REBALANCE_THRESHOLD,
      highLossRatio: env.MAX_LOSS_RATIO,
    },
  }),
});
