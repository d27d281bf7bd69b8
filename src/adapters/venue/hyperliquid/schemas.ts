/**
 * Valibot schemas for the Hyperliquid info and exchange responses the
 * client reads. Numeric fields arrive as decimal strings.
 */

import * as v from "valibot";

export const decimalStringSchema = v.pipe(
  v.string(),
  v.nonEmpty(),
  v.transform((value) => Number(value)),
  v.finite(),
);

export const clearinghouseStateSchema = v.object({
  marginSummary: v.object({
    accountValue: decimalStringSchema,
  }),
  withdrawable: decimalStringSchema,
  assetPositions: v.array(
    v.object({
      position: v.object({
        coin: v.string(),
        szi: decimalStringSchema,
        entryPx: v.nullish(decimalStringSchema),
        unrealizedPnl: decimalStringSchema,
      }),
    }),
  ),
});

export type ClearinghouseState = v.InferOutput<typeof clearinghouseStateSchema>;

export const allMidsSchema = v.record(v.string(), decimalStringSchema);

export const metaSchema = v.object({
  universe: v.array(
    v.object({
      name: v.string(),
      szDecimals: v.pipe(v.number(), v.integer(), v.minValue(0)),
    }),
  ),
});

export type Meta = v.InferOutput<typeof metaSchema>;

export const openOrdersSchema = v.array(
  v.object({
    coin: v.string(),
    oid: v.number(),
  }),
);

export const orderStatusSchema = v.union([
  v.object({
    filled: v.object({
      totalSz: decimalStringSchema,
      avgPx: decimalStringSchema,
      oid: v.number(),
    }),
  }),
  v.object({
    resting: v.object({
      oid: v.number(),
    }),
  }),
  v.object({
    error: v.string(),
  }),
  v.picklist(["waitingForFill", "waitingForTrigger"] as const),
]);

export type OrderStatus = v.InferOutput<typeof orderStatusSchema>;

export const orderResponseSchema = v.variant("status", [
  v.object({
    status: v.literal("ok"),
    response: v.object({
      type: v.literal("order"),
      data: v.object({
        statuses: v.pipe(v.array(orderStatusSchema), v.minLength(1)),
      }),
    }),
  }),
  v.object({
    status: v.literal("err"),
    response: v.string(),
  }),
]);

export type OrderResponse = v.InferOutput<typeof orderResponseSchema>;

export const cancelResponseSchema = v.object({
  status: v.literal("ok"),
});
