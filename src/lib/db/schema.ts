import {
  boolean,
  doublePrecision,
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

export interface StoredTransition {
  from: string;
  to: string;
  /** ISO-8601 */
  at: string;
}

export const hedgeExecutions = pgTable(
  "hedge_executions",
  {
    id: uuid("id").primaryKey(),
    symbol: text("symbol").notNull(),
    reason: text("reason").notNull(), // 'threshold_breach' | 'rebalance' | 'emergency_close'
    side: text("side").notNull(), // 'BUY' | 'SELL'
    status: text("status").notNull(),
    rejectReason: text("reject_reason"),
    requestedAdjustment: doublePrecision("requested_adjustment").notNull(),
    size: doublePrecision("size").notNull(),
    reduceOnly: boolean("reduce_only").notNull().default(false),
    midPrice: doublePrecision("mid_price"),
    limitPrice: doublePrecision("limit_price"),
    orderId: text("order_id"),
    filledSize: doublePrecision("filled_size").notNull().default(0),
    avgPrice: doublePrecision("avg_price"),
    message: text("message"),
    transitions: jsonb("transitions").$type<StoredTransition[]>().notNull().default([]),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    createdAtIdx: index("idx_hedge_executions_created_at").on(table.createdAt),
    statusCreatedAtIdx: index("idx_hedge_executions_status_created_at").on(
      table.status,
      table.createdAt,
    ),
  }),
);
