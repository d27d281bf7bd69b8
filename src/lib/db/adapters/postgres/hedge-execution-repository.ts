import { and, count, desc, eq, gte } from "drizzle-orm";
import * as v from "valibot";

import {
  type ExecutionStatus,
  type HedgeExecution,
  executionStatusSchema,
  rejectReasonSchema,
} from "@/domains/state";

import type { Database } from "../../client";
import type { HedgeExecutionRepository } from "../../ports/hedge-execution-repository";
import { type StoredTransition, hedgeExecutions } from "../../schema";

const hedgeReasonSchema = v.picklist(["threshold_breach", "rebalance", "emergency_close"]);
const orderSideSchema = v.picklist(["BUY", "SELL"]);

const transitionsSchema = v.array(
  v.object({
    from: executionStatusSchema,
    to: executionStatusSchema,
    at: v.pipe(v.string(), v.isoTimestamp()),
  }),
);

const parseColumn = <TSchema extends v.GenericSchema>(
  schema: TSchema,
  value: unknown,
  column: string,
): v.InferOutput<TSchema> => {
  const result = v.safeParse(schema, value);
  if (!result.success) {
    throw new Error(`Invalid hedge execution ${column}: ${JSON.stringify(value)}`);
  }
  return result.output;
};

const mapToDomain = (row: typeof hedgeExecutions.$inferSelect): HedgeExecution => ({
  id: row.id,
  symbol: row.symbol,
  reason: parseColumn(hedgeReasonSchema, row.reason, "reason"),
  side: parseColumn(orderSideSchema, row.side, "side"),
  requestedAdjustment: row.requestedAdjustment,
  size: row.size,
  reduceOnly: row.reduceOnly,
  midPrice: row.midPrice ?? null,
  limitPrice: row.limitPrice ?? null,
  orderId: row.orderId ?? null,
  filledSize: row.filledSize,
  avgPrice: row.avgPrice ?? null,
  status: parseColumn(executionStatusSchema, row.status, "status"),
  rejectReason:
    row.rejectReason === null
      ? null
      : parseColumn(rejectReasonSchema, row.rejectReason, "reject_reason"),
  message: row.message ?? null,
  transitions: parseColumn(transitionsSchema, row.transitions, "transitions").map(
    (transition) => ({ from: transition.from, to: transition.to, at: new Date(transition.at) }),
  ),
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

const mapToDb = (execution: HedgeExecution): typeof hedgeExecutions.$inferInsert => ({
  id: execution.id,
  symbol: execution.symbol,
  reason: execution.reason,
  side: execution.side,
  status: execution.status,
  rejectReason: execution.rejectReason,
  requestedAdjustment: execution.requestedAdjustment,
  size: execution.size,
  reduceOnly: execution.reduceOnly,
  midPrice: execution.midPrice,
  limitPrice: execution.limitPrice,
  orderId: execution.orderId,
  filledSize: execution.filledSize,
  avgPrice: execution.avgPrice,
  message: execution.message,
  transitions: execution.transitions.map(
    (transition): StoredTransition => ({
      from: transition.from,
      to: transition.to,
      at: transition.at.toISOString(),
    }),
  ),
  createdAt: execution.createdAt,
  updatedAt: execution.updatedAt,
});

const FILLED: ExecutionStatus = "FILLED";

export const createPostgresHedgeExecutionRepository = (
  db: Database,
): HedgeExecutionRepository => ({
  save: async (execution) => {
    const { id: _id, createdAt: _createdAt, ...updates } = mapToDb(execution);
    await db
      .insert(hedgeExecutions)
      .values(mapToDb(execution))
      .onConflictDoUpdate({ target: hedgeExecutions.id, set: updates });
  },

  findById: async (id) => {
    const [result] = await db.select().from(hedgeExecutions).where(eq(hedgeExecutions.id, id));
    return result ? mapToDomain(result) : null;
  },

  listRecent: async (limit) => {
    const results = await db
      .select()
      .from(hedgeExecutions)
      .orderBy(desc(hedgeExecutions.createdAt))
      .limit(limit);
    return results.map(mapToDomain);
  },

  countFilledSince: async (since) => {
    const [result] = await db
      .select({ value: count() })
      .from(hedgeExecutions)
      .where(and(eq(hedgeExecutions.status, FILLED), gte(hedgeExecutions.createdAt, since)));
    return result?.value ?? 0;
  },
});
