/**
 * Paper trading venue.
 *
 * Fills crossing limit orders at the mid price and tracks one perp position
 * per symbol against a quote margin balance. Mid prices come from
 * `setMidPrice` or, when none was set, from the `referencePrice` callback
 * (the worker feeds it the pool price). Orders that do not cross are
 * cancelled (Ioc) or rest until `cancelAllOrders` (Gtc); resting orders
 * never fill.
 */

import { VenueError } from "../errors";
import type {
  AccountState,
  HedgePosition,
  LimitOrderRequest,
  OrderResult,
  VenueClient,
} from "../types";

export interface PaperVenueConfig {
  initialMarginQuote: number;
  maxLeverage?: number;
  referencePrice?: (symbol: string) => number | undefined;
}

export interface PaperFill {
  orderId: string;
  symbol: string;
  /** Signed base size */
  size: number;
  price: number;
  at: Date;
}

export interface PaperVenueClient extends VenueClient {
  setMidPrice(symbol: string, price: number): void;
  getFills(): readonly PaperFill[];
}

interface PaperPosition {
  size: number;
  entryPrice: number;
}

interface RestingOrder {
  orderId: string;
  request: LimitOrderRequest;
}

const VENUE = "paper";

const rejected = (orderId: string, message: string): OrderResult => ({
  status: "REJECTED",
  orderId,
  filledSize: 0,
  avgPrice: null,
  message,
});

/**
 * Create a paper trading venue.
 *
 * @example
 * ```typescript
 * const venue = createPaperVenue({ initialMarginQuote: 10_000 });
 * venue.setMidPrice("ETH", 2000);
 * await venue.submitLimitOrder({
 *   symbol: "ETH", side: "SELL", size: 0.5, limitPrice: 1990,
 *   timeInForce: "Ioc", reduceOnly: false,
 * });
 * ```
 */
export const createPaperVenue = (config: PaperVenueConfig): PaperVenueClient => {
  const maxLeverage = config.maxLeverage ?? 1;
  const midPrices = new Map<string, number>();
  const positions = new Map<string, PaperPosition>();
  const resting = new Map<string, RestingOrder>();
  const fills: PaperFill[] = [];
  let realizedQuote = 0;
  let orderSequence = 0;

  const findMidPrice = (symbol: string): number | undefined => {
    const price = midPrices.get(symbol) ?? config.referencePrice?.(symbol);
    return price !== undefined && Number.isFinite(price) && price > 0 ? price : undefined;
  };

  const requireMidPrice = (symbol: string): number => {
    const price = findMidPrice(symbol);
    if (price === undefined) {
      throw new VenueError(`No mid price for ${symbol}`, "UNKNOWN_SYMBOL", VENUE);
    }
    return price;
  };

  const computeAccountState = (): AccountState => {
    let unrealizedQuote = 0;
    let usedMarginQuote = 0;
    for (const [symbol, position] of positions) {
      const mark = findMidPrice(symbol) ?? position.entryPrice;
      unrealizedQuote += position.size * (mark - position.entryPrice);
      usedMarginQuote += (Math.abs(position.size) * mark) / maxLeverage;
    }
    const accountValueQuote = config.initialMarginQuote + realizedQuote + unrealizedQuote;
    return {
      accountValueQuote,
      availableMarginQuote: accountValueQuote - usedMarginQuote,
    };
  };

  const applyFill = (symbol: string, signedSize: number, price: number): void => {
    const position = positions.get(symbol);
    if (!position || position.size === 0) {
      positions.set(symbol, { size: signedSize, entryPrice: price });
      return;
    }

    const nextSize = position.size + signedSize;
    if (Math.sign(signedSize) === Math.sign(position.size)) {
      const entryPrice =
        (Math.abs(position.size) * position.entryPrice + Math.abs(signedSize) * price) /
        Math.abs(nextSize);
      positions.set(symbol, { size: nextSize, entryPrice });
      return;
    }

    const closed = Math.min(Math.abs(signedSize), Math.abs(position.size));
    realizedQuote += closed * (price - position.entryPrice) * Math.sign(position.size);

    if (nextSize === 0) {
      positions.delete(symbol);
    } else if (Math.sign(nextSize) !== Math.sign(position.size)) {
      positions.set(symbol, { size: nextSize, entryPrice: price });
    } else {
      positions.set(symbol, { size: nextSize, entryPrice: position.entryPrice });
    }
  };

  return {
    venue: VENUE,

    setMidPrice: (symbol: string, price: number): void => {
      midPrices.set(symbol, price);
    },

    getFills: (): readonly PaperFill[] => fills,

    getHedgePosition: async (symbol: string): Promise<HedgePosition> => {
      const position = positions.get(symbol);
      if (!position) {
        return { symbol, size: 0, entryPrice: null, unrealizedPnlQuote: 0 };
      }
      const mark = findMidPrice(symbol) ?? position.entryPrice;
      return {
        symbol,
        size: position.size,
        entryPrice: position.entryPrice,
        unrealizedPnlQuote: position.size * (mark - position.entryPrice),
      };
    },

    getAccountState: async (): Promise<AccountState> => computeAccountState(),

    getMidPrice: async (symbol: string): Promise<number> => requireMidPrice(symbol),

    submitLimitOrder: async (request: LimitOrderRequest): Promise<OrderResult> => {
      orderSequence += 1;
      const orderId = `paper-${orderSequence}`;

      if (!(request.size > 0) || !(request.limitPrice > 0)) {
        return rejected(orderId, "Order size and limit price must be positive");
      }

      const midPrice = requireMidPrice(request.symbol);
      const current = positions.get(request.symbol)?.size ?? 0;
      const direction = request.side === "BUY" ? 1 : -1;
      let fillSize = request.size;

      if (request.reduceOnly) {
        if (current === 0 || Math.sign(current) === direction) {
          return rejected(orderId, "Reduce only order would increase position");
        }
        fillSize = Math.min(request.size, Math.abs(current));
      }

      const crosses =
        request.side === "BUY" ? request.limitPrice >= midPrice : request.limitPrice <= midPrice;

      if (!crosses) {
        if (request.timeInForce === "Ioc") {
          return {
            status: "CANCELLED",
            orderId,
            filledSize: 0,
            avgPrice: null,
            message: "Order could not immediately match",
          };
        }
        resting.set(orderId, { orderId, request });
        return { status: "RESTING", orderId, filledSize: 0, avgPrice: null, message: null };
      }

      const signedFill = direction * fillSize;
      const increase = Math.max(0, Math.abs(current + signedFill) - Math.abs(current));
      const requiredMargin = (increase * midPrice) / maxLeverage;
      if (requiredMargin > computeAccountState().availableMarginQuote) {
        return rejected(orderId, "Insufficient margin");
      }

      applyFill(request.symbol, signedFill, midPrice);
      fills.push({
        orderId,
        symbol: request.symbol,
        size: signedFill,
        price: midPrice,
        at: new Date(),
      });

      return {
        status: fillSize < request.size ? "PARTIALLY_FILLED" : "FILLED",
        orderId,
        filledSize: fillSize,
        avgPrice: midPrice,
        message: null,
      };
    },

    cancelAllOrders: async (symbol: string): Promise<number> => {
      let cancelled = 0;
      for (const [orderId, order] of resting) {
        if (order.request.symbol === symbol) {
          resting.delete(orderId);
          cancelled += 1;
        }
      }
      return cancelled;
    },
  };
};
