import { beforeEach, describe, expect, it, vi } from "vitest";

import type { Logger } from "@/lib/logger";
import { createRequestPolicy } from "@/lib/resilience";

import { VenueError } from "../errors";
import type { LimitOrderRequest, VenueClient } from "../types";
import { createHyperliquidVenue } from "./client";

const PRIVATE_KEY = "0x1111111111111111111111111111111111111111111111111111111111111111";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

class ApiRequestError extends Error {
  public override readonly name = "ApiRequestError";
}

const META = {
  universe: [
    { name: "BTC", szDecimals: 5, maxLeverage: 50 },
    { name: "ETH", szDecimals: 4, maxLeverage: 25 },
  ],
};

const CLEARINGHOUSE_STATE = {
  marginSummary: { accountValue: "1500.5", totalNtlPos: "500.0", totalMarginUsed: "100.0" },
  withdrawable: "900",
  assetPositions: [
    {
      type: "oneWay",
      position: { coin: "ETH", szi: "-0.25", entryPx: "2000.0", unrealizedPnl: "12.5" },
    },
  ],
};

const sellOrder = (overrides: Partial<LimitOrderRequest> = {}): LimitOrderRequest => ({
  symbol: "ETH",
  side: "SELL",
  size: 0.123456,
  limitPrice: 1990.123,
  timeInForce: "Ioc",
  reduceOnly: false,
  ...overrides,
});

const filled = (totalSz: string, avgPx: string, oid: number) => ({
  status: "ok",
  response: { type: "order", data: { statuses: [{ filled: { totalSz, avgPx, oid } }] } },
});

describe("createHyperliquidVenue", () => {
  const info = {
    clearinghouseState: vi.fn(),
    allMids: vi.fn(),
    meta: vi.fn(),
    openOrders: vi.fn(),
  };
  const exchange = {
    order: vi.fn(),
    cancel: vi.fn(),
  };
  let venue: VenueClient;

  beforeEach(() => {
    vi.resetAllMocks();
    info.meta.mockResolvedValue(META);
    venue = createHyperliquidVenue({
      privateKey: PRIVATE_KEY,
      testnet: true,
      logger: createMockLogger(),
      policy: createRequestPolicy({ name: "hyperliquid", maxAttempts: 1 }),
      clients: { info, exchange },
    });
  });

  describe("getHedgePosition", () => {
    it("should parse the signed position size", async () => {
      info.clearinghouseState.mockResolvedValue(CLEARINGHOUSE_STATE);

      await expect(venue.getHedgePosition("ETH")).resolves.toEqual({
        symbol: "ETH",
        size: -0.25,
        entryPrice: 2000,
        unrealizedPnlQuote: 12.5,
      });
    });

    it("should report a flat position when the coin is absent", async () => {
      info.clearinghouseState.mockResolvedValue(CLEARINGHOUSE_STATE);

      await expect(venue.getHedgePosition("BTC")).resolves.toEqual({
        symbol: "BTC",
        size: 0,
        entryPrice: null,
        unrealizedPnlQuote: 0,
      });
    });

    it("should throw INVALID_RESPONSE for a malformed state", async () => {
      info.clearinghouseState.mockResolvedValue({ marginSummary: {} });

      await expect(venue.getHedgePosition("ETH")).rejects.toMatchObject({
        code: "INVALID_RESPONSE",
      });
    });

    it("should wrap transport failures as NETWORK_ERROR", async () => {
      info.clearinghouseState.mockRejectedValue(new Error("socket hang up"));

      const error: unknown = await venue.getHedgePosition("ETH").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VenueError);
      expect(error).toMatchObject({ code: "NETWORK_ERROR", venue: "hyperliquid" });
    });
  });

  describe("getAccountState", () => {
    it("should map account value and withdrawable margin", async () => {
      info.clearinghouseState.mockResolvedValue(CLEARINGHOUSE_STATE);

      await expect(venue.getAccountState()).resolves.toEqual({
        accountValueQuote: 1500.5,
        availableMarginQuote: 900,
      });
    });
  });

  describe("getMidPrice", () => {
    it("should return the mid for the symbol", async () => {
      info.allMids.mockResolvedValue({ ETH: "2001.5", BTC: "60000" });

      await expect(venue.getMidPrice("ETH")).resolves.toBe(2001.5);
    });

    it("should throw UNKNOWN_SYMBOL when the venue has no mid", async () => {
      info.allMids.mockResolvedValue({ BTC: "60000" });

      await expect(venue.getMidPrice("ETH")).rejects.toMatchObject({ code: "UNKNOWN_SYMBOL" });
    });
  });

  describe("submitLimitOrder", () => {
    it("should send a rounded Ioc order and map the fill", async () => {
      exchange.order.mockResolvedValue(filled("0.1235", "1995.2", 77));

      const result = await venue.submitLimitOrder(sellOrder());

      expect(exchange.order).toHaveBeenCalledWith({
        orders: [
          { a: 1, b: false, p: "1990.1", s: "0.1235", r: false, t: { limit: { tif: "Ioc" } } },
        ],
        grouping: "na",
      });
      expect(result).toEqual({
        status: "FILLED",
        orderId: "77",
        filledSize: 0.1235,
        avgPrice: 1995.2,
        message: null,
      });
    });

    it("should report a partial fill", async () => {
      exchange.order.mockResolvedValue(filled("0.1", "1995.2", 78));

      const result = await venue.submitLimitOrder(sellOrder());

      expect(result.status).toBe("PARTIALLY_FILLED");
      expect(result.filledSize).toBe(0.1);
    });

    it("should map an unmatched Ioc order to CANCELLED", async () => {
      const message = "Order could not immediately match against any resting orders. asset=1";
      exchange.order.mockResolvedValue({
        status: "ok",
        response: { type: "order", data: { statuses: [{ error: message }] } },
      });

      const result = await venue.submitLimitOrder(sellOrder());

      expect(result).toEqual({
        status: "CANCELLED",
        orderId: null,
        filledSize: 0,
        avgPrice: null,
        message,
      });
    });

    it("should map a resting Gtc order", async () => {
      exchange.order.mockResolvedValue({
        status: "ok",
        response: { type: "order", data: { statuses: [{ resting: { oid: 91 } }] } },
      });

      const result = await venue.submitLimitOrder(sellOrder({ timeInForce: "Gtc" }));

      expect(result).toMatchObject({ status: "RESTING", orderId: "91" });
    });

    it("should map an exchange error response to REJECTED", async () => {
      exchange.order.mockRejectedValue(new ApiRequestError("Insufficient margin to place order."));

      const result = await venue.submitLimitOrder(sellOrder());

      expect(result).toEqual({
        status: "REJECTED",
        orderId: null,
        filledSize: 0,
        avgPrice: null,
        message: "Insufficient margin to place order.",
      });
    });

    it("should never retry an order after a transport failure", async () => {
      venue = createHyperliquidVenue({
        privateKey: PRIVATE_KEY,
        testnet: true,
        logger: createMockLogger(),
        policy: createRequestPolicy({ name: "hyperliquid", maxAttempts: 3 }),
        clients: { info, exchange },
      });
      exchange.order.mockRejectedValue(new Error("socket hang up"));

      await expect(venue.submitLimitOrder(sellOrder())).rejects.toMatchObject({
        code: "NETWORK_ERROR",
      });
      expect(exchange.order).toHaveBeenCalledTimes(1);
    });

    it("should reject a size that rounds to zero without calling the exchange", async () => {
      const result = await venue.submitLimitOrder(sellOrder({ size: 0.00001 }));

      expect(result.status).toBe("REJECTED");
      expect(exchange.order).not.toHaveBeenCalled();
    });

    it("should throw UNKNOWN_SYMBOL for an unlisted asset and cache the metadata", async () => {
      exchange.order.mockResolvedValue(filled("0.1235", "1995.2", 77));

      await expect(venue.submitLimitOrder(sellOrder({ symbol: "DOGE" }))).rejects.toMatchObject({
        code: "UNKNOWN_SYMBOL",
      });
      await venue.submitLimitOrder(sellOrder());

      expect(info.meta).toHaveBeenCalledTimes(1);
    });
  });

  describe("cancelAllOrders", () => {
    it("should cancel only the orders for the symbol", async () => {
      info.openOrders.mockResolvedValue([
        { coin: "ETH", oid: 1, side: "A", limitPx: "2100", sz: "0.1" },
        { coin: "BTC", oid: 2, side: "B", limitPx: "59000", sz: "0.01" },
        { coin: "ETH", oid: 3, side: "B", limitPx: "1900", sz: "0.1" },
      ]);
      exchange.cancel.mockResolvedValue({
        status: "ok",
        response: { type: "cancel", data: { statuses: ["success", "success"] } },
      });

      await expect(venue.cancelAllOrders("ETH")).resolves.toBe(2);
      expect(exchange.cancel).toHaveBeenCalledWith({
        cancels: [
          { a: 1, o: 1 },
          { a: 1, o: 3 },
        ],
      });
    });

    it("should skip the cancel call when nothing is open", async () => {
      info.openOrders.mockResolvedValue([]);

      await expect(venue.cancelAllOrders("ETH")).resolves.toBe(0);
      expect(exchange.cancel).not.toHaveBeenCalled();
    });
  });
});
