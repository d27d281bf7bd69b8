/**
 * Venue client interface and the shapes it exchanges with the hedger.
 *
 * Sizes are base-asset units as plain numbers; prices and account values
 * are quote (USD) units.
 */

import * as v from "valibot";

import type { OrderSide } from "@/domains/hedging";
import type { TimeInForce } from "@/domains/risk";

export type Venue = "paper" | "hyperliquid";

export type VenueOrderStatus = "FILLED" | "PARTIALLY_FILLED" | "RESTING" | "CANCELLED" | "REJECTED";

export interface HedgePosition {
  symbol: string;
  /** Signed; negative is short */
  size: number;
  entryPrice: number | null;
  unrealizedPnlQuote: number;
}

export interface AccountState {
  accountValueQuote: number;
  availableMarginQuote: number;
}

export interface LimitOrderRequest {
  symbol: string;
  side: OrderSide;
  /** Unsigned base size */
  size: number;
  limitPrice: number;
  timeInForce: TimeInForce;
  reduceOnly: boolean;
}

export interface OrderResult {
  status: VenueOrderStatus;
  orderId: string | null;
  filledSize: number;
  avgPrice: number | null;
  /** Venue message for rejected or unfilled orders */
  message: string | null;
}

export interface VenueClient {
  readonly venue: Venue;

  getHedgePosition(symbol: string): Promise<HedgePosition>;
  getAccountState(): Promise<AccountState>;
  getMidPrice(symbol: string): Promise<number>;

  submitLimitOrder(request: LimitOrderRequest): Promise<OrderResult>;
  /** Returns the number of orders cancelled */
  cancelAllOrders(symbol: string): Promise<number>;
}

// --- Valibot Schemas ---

const finiteSchema = v.pipe(v.number(), v.finite());

export const venueOrderStatusSchema = v.picklist([
  "FILLED",
  "PARTIALLY_FILLED",
  "RESTING",
  "CANCELLED",
  "REJECTED",
] as const);

export const hedgePositionSchema = v.object({
  symbol: v.pipe(v.string(), v.minLength(1)),
  size: finiteSchema,
  entryPrice: v.nullable(v.pipe(v.number(), v.gtValue(0))),
  unrealizedPnlQuote: finiteSchema,
});

export const accountStateSchema = v.object({
  accountValueQuote: finiteSchema,
  availableMarginQuote: finiteSchema,
});

export const orderResultSchema = v.object({
  status: venueOrderStatusSchema,
  orderId: v.nullable(v.string()),
  filledSize: v.pipe(v.number(), v.minValue(0)),
  avgPrice: v.nullable(v.pipe(v.number(), v.gtValue(0))),
  message: v.nullable(v.string()),
});

// --- Type Guards ---

export const isHedgePosition = (value: unknown): value is HedgePosition =>
  v.is(hedgePositionSchema, value);

export const isAccountState = (value: unknown): value is AccountState =>
  v.is(accountStateSchema, value);

export const isOrderResult = (value: unknown): value is OrderResult =>
  v.is(orderResultSchema, value);
