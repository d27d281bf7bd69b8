/**
 * Hyperliquid perp venue client.
 *
 * Info and exchange calls go through one request policy (timeout, circuit
 * breaker, retry). Order placement is never retried. Every response is
 * parsed with valibot before it reaches the hedger.
 */

import * as hl from "@nktkas/hyperliquid";
import * as v from "valibot";
import type { Address, Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { type Logger, toError } from "@/lib/logger";
import { type RequestPolicy, createRequestPolicy } from "@/lib/resilience";

import { VenueError } from "../errors";
import type {
  AccountState,
  HedgePosition,
  LimitOrderRequest,
  OrderResult,
  VenueClient,
} from "../types";
import { formatPrice, formatSize } from "./format";
import {
  type Meta,
  type OrderResponse,
  allMidsSchema,
  cancelResponseSchema,
  clearinghouseStateSchema,
  metaSchema,
  openOrdersSchema,
  orderResponseSchema,
} from "./schemas";

const VENUE = "hyperliquid";

export interface HyperliquidOrderParams {
  orders: {
    a: number;
    b: boolean;
    p: string;
    s: string;
    r: boolean;
    t: { limit: { tif: "Ioc" | "Gtc" } };
  }[];
  grouping: "na";
}

/** The subset of the SDK info client the venue reads */
export interface HyperliquidInfoApi {
  clearinghouseState(params: { user: Address }): Promise<unknown>;
  allMids(): Promise<unknown>;
  meta(): Promise<unknown>;
  openOrders(params: { user: Address }): Promise<unknown>;
}

/** The subset of the SDK exchange client the venue writes through */
export interface HyperliquidExchangeApi {
  order(params: HyperliquidOrderParams): Promise<unknown>;
  cancel(params: { cancels: { a: number; o: number }[] }): Promise<unknown>;
}

export interface HyperliquidVenueConfig {
  privateKey: Hex;
  testnet: boolean;
  logger: Logger;
  policy?: RequestPolicy;
  /** Prebuilt SDK clients; built from the private key when omitted */
  clients?: {
    info: HyperliquidInfoApi;
    exchange: HyperliquidExchangeApi;
  };
}

interface AssetInfo {
  index: number;
  szDecimals: number;
}

const NOT_MATCHED_PATTERN = /could not immediately match/i;

/** The SDK throws ApiRequestError when the exchange answers with an error status */
const isApiRequestError = (error: unknown): error is Error =>
  error instanceof Error && error.name === "ApiRequestError";

const toOrderResult = (response: OrderResponse, requestedSize: number): OrderResult => {
  if (response.status === "err") {
    return {
      status: "REJECTED",
      orderId: null,
      filledSize: 0,
      avgPrice: null,
      message: response.response,
    };
  }

  const [status] = response.response.data.statuses;
  if (status === undefined || typeof status === "string") {
    return { status: "RESTING", orderId: null, filledSize: 0, avgPrice: null, message: null };
  }
  if ("filled" in status) {
    const { totalSz, avgPx, oid } = status.filled;
    return {
      status: totalSz < requestedSize ? "PARTIALLY_FILLED" : "FILLED",
      orderId: String(oid),
      filledSize: totalSz,
      avgPrice: avgPx,
      message: null,
    };
  }
  if ("resting" in status) {
    // The resting status carries no fill size; the hedger settles a resting
    // order against the position after cancelling it
    return {
      status: "RESTING",
      orderId: String(status.resting.oid),
      filledSize: 0,
      avgPrice: null,
      message: null,
    };
  }
  return {
    status: NOT_MATCHED_PATTERN.test(status.error) ? "CANCELLED" : "REJECTED",
    orderId: null,
    filledSize: 0,
    avgPrice: null,
    message: status.error,
  };
};

const createSdkClients = (
  privateKey: Hex,
  testnet: boolean,
): { info: HyperliquidInfoApi; exchange: HyperliquidExchangeApi } => {
  const transport = new hl.HttpTransport({ isTestnet: testnet });
  return {
    info: new hl.InfoClient({ transport }),
    exchange: new hl.ExchangeClient({ wallet: privateKeyToAccount(privateKey), transport }),
  };
};

/**
 * Create a Hyperliquid venue client for the account owning `privateKey`.
 */
export const createHyperliquidVenue = (config: HyperliquidVenueConfig): VenueClient => {
  const { logger } = config;
  const user = privateKeyToAccount(config.privateKey).address;
  const { info, exchange } = config.clients ?? createSdkClients(config.privateKey, config.testnet);
  const policy = config.policy ?? createRequestPolicy({ name: VENUE, logger });
  let meta: Meta | null = null;

  const request = async <TSchema extends v.GenericSchema>(
    operation: string,
    fn: () => Promise<unknown>,
    schema: TSchema,
    retry = true,
  ): Promise<v.InferOutput<TSchema>> => {
    let raw: unknown;
    try {
      raw = await policy.execute(fn, { operation, retry });
    } catch (error) {
      if (error instanceof VenueError) {
        throw error;
      }
      throw new VenueError(
        `${operation} failed: ${toError(error).message}`,
        "NETWORK_ERROR",
        VENUE,
        error,
      );
    }

    const result = v.safeParse(schema, raw);
    if (!result.success) {
      logger.warn("Unexpected venue response", {
        venue: VENUE,
        operation,
        issues: result.issues.map((issue) => issue.message),
      });
      throw new VenueError(`Unexpected ${operation} response`, "INVALID_RESPONSE", VENUE);
    }
    return result.output;
  };

  const resolveAsset = async (symbol: string): Promise<AssetInfo> => {
    if (!meta) {
      meta = await request("meta", () => info.meta(), metaSchema);
    }
    const index = meta.universe.findIndex((asset) => asset.name === symbol);
    const asset = meta.universe[index];
    if (!asset) {
      throw new VenueError(`Unknown symbol ${symbol}`, "UNKNOWN_SYMBOL", VENUE);
    }
    return { index, szDecimals: asset.szDecimals };
  };

  return {
    venue: VENUE,

    getHedgePosition: async (symbol: string): Promise<HedgePosition> => {
      const state = await request(
        "clearinghouseState",
        () => info.clearinghouseState({ user }),
        clearinghouseStateSchema,
      );
      const entry = state.assetPositions.find(({ position }) => position.coin === symbol);
      if (!entry) {
        return { symbol, size: 0, entryPrice: null, unrealizedPnlQuote: 0 };
      }
      return {
        symbol,
        size: entry.position.szi,
        entryPrice: entry.position.entryPx ?? null,
        unrealizedPnlQuote: entry.position.unrealizedPnl,
      };
    },

    getAccountState: async (): Promise<AccountState> => {
      const state = await request(
        "clearinghouseState",
        () => info.clearinghouseState({ user }),
        clearinghouseStateSchema,
      );
      return {
        accountValueQuote: state.marginSummary.accountValue,
        availableMarginQuote: state.withdrawable,
      };
    },

    getMidPrice: async (symbol: string): Promise<number> => {
      const mids = await request("allMids", () => info.allMids(), allMidsSchema);
      const mid = mids[symbol];
      if (mid === undefined || !(mid > 0)) {
        throw new VenueError(`No mid price for ${symbol}`, "UNKNOWN_SYMBOL", VENUE);
      }
      return mid;
    },

    submitLimitOrder: async (order: LimitOrderRequest): Promise<OrderResult> => {
      const asset = await resolveAsset(order.symbol);
      const size = formatSize(order.size, asset.szDecimals);
      if (Number(size) <= 0) {
        return {
          status: "REJECTED",
          orderId: null,
          filledSize: 0,
          avgPrice: null,
          message: `Order size ${order.size} is below venue precision`,
        };
      }

      const params: HyperliquidOrderParams = {
        orders: [
          {
            a: asset.index,
            b: order.side === "BUY",
            p: formatPrice(order.limitPrice, asset.szDecimals),
            s: size,
            r: order.reduceOnly,
            t: { limit: { tif: order.timeInForce } },
          },
        ],
        grouping: "na",
      };

      logger.debug("Submitting venue order", {
        venue: VENUE,
        symbol: order.symbol,
        side: order.side,
        size,
        limitPrice: params.orders[0]?.p,
        reduceOnly: order.reduceOnly,
      });

      const response = await request(
        "order",
        async () => {
          try {
            return await exchange.order(params);
          } catch (error) {
            if (isApiRequestError(error)) {
              return { status: "err", response: error.message };
            }
            throw error;
          }
        },
        orderResponseSchema,
        false,
      );

      return toOrderResult(response, Number(size));
    },

    cancelAllOrders: async (symbol: string): Promise<number> => {
      const orders = await request(
        "openOrders",
        () => info.openOrders({ user }),
        openOrdersSchema,
      );
      const matching = orders.filter((order) => order.coin === symbol);
      if (matching.length === 0) {
        return 0;
      }

      const asset = await resolveAsset(symbol);
      const cancels = matching.map((order) => ({ a: asset.index, o: order.oid }));
      await request("cancel", () => exchange.cancel({ cancels }), cancelResponseSchema);
      return matching.length;
    },
  };
};
