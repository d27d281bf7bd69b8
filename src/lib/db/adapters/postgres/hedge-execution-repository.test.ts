import { beforeEach, describe, expect, it, vi } from "vitest";

import { createHedgeExecution, transitionExecution } from "@/domains/state";

import type { Database } from "../../client";
import { createPostgresHedgeExecutionRepository } from "./hedge-execution-repository";

const CREATED_AT = new Date("2024-03-01T12:00:00.000Z");
const VALIDATED_AT = new Date("2024-03-01T12:00:01.000Z");

const row = {
  id: "7f1c2a4e-0000-4000-8000-000000000001",
  symbol: "ETH",
  reason: "threshold_breach",
  side: "SELL",
  status: "VALIDATED",
  rejectReason: null,
  requestedAdjustment: -0.13,
  size: 0.13,
  reduceOnly: false,
  midPrice: 2000,
  limitPrice: 1990,
  orderId: null,
  filledSize: 0,
  avgPrice: null,
  message: null,
  transitions: [{ from: "PROPOSED", to: "VALIDATED", at: VALIDATED_AT.toISOString() }],
  createdAt: CREATED_AT,
  updatedAt: VALIDATED_AT,
};

describe("createPostgresHedgeExecutionRepository", () => {
  const onConflictDoUpdate = vi.fn();
  const values = vi.fn(() => ({ onConflictDoUpdate }));
  const insert = vi.fn(() => ({ values }));
  const where = vi.fn();
  const from = vi.fn(() => ({ where }));
  const select = vi.fn(() => ({ from }));
  const db = { insert, select } as unknown as Database;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should upsert with serialized transitions", async () => {
    const proposed = createHedgeExecution({
      id: row.id,
      symbol: "ETH",
      reason: "threshold_breach",
      requestedAdjustment: -0.13,
      side: "SELL",
      size: 0.13,
      reduceOnly: false,
      now: CREATED_AT,
    });
    const result = transitionExecution(
      proposed,
      { type: "VALIDATE", limitPrice: 1990, midPrice: 2000 },
      VALIDATED_AT,
    );
    if (!result.ok) {
      throw new Error(result.error);
    }

    await createPostgresHedgeExecutionRepository(db).save(result.state);

    expect(values).toHaveBeenCalledWith(row);
    const [conflict] = onConflictDoUpdate.mock.calls[0] as [{ set: Record<string, unknown> }];
    expect(conflict.set).not.toHaveProperty("id");
    expect(conflict.set).not.toHaveProperty("createdAt");
    expect(conflict.set.status).toBe("VALIDATED");
  });

  it("should map a row back to the domain", async () => {
    where.mockResolvedValue([row]);

    const execution = await createPostgresHedgeExecutionRepository(db).findById(row.id);

    expect(execution).toMatchObject({
      id: row.id,
      status: "VALIDATED",
      side: "SELL",
      limitPrice: 1990,
      transitions: [{ from: "PROPOSED", to: "VALIDATED", at: VALIDATED_AT }],
    });
  });

  it("should return null when no row matches", async () => {
    where.mockResolvedValue([]);

    await expect(createPostgresHedgeExecutionRepository(db).findById(row.id)).resolves.toBeNull();
  });

  it("should refuse a row with an unknown status", async () => {
    where.mockResolvedValue([{ ...row, status: "PENDING" }]);

    await expect(createPostgresHedgeExecutionRepository(db).findById(row.id)).rejects.toThrow(
      'Invalid hedge execution status: "PENDING"',
    );
  });
});
