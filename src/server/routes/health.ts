import { sql } from "drizzle-orm";
import { Hono } from "hono";

import { type BasePublicClient, checkRpcHealth } from "@/lib/chain";
import type { Database } from "@/lib/db";
import type { CycleRunner } from "@/worker/orchestrator";

type CheckResult = { status: "healthy" | "unhealthy"; error?: string };

export interface HealthRouteDeps {
  runner: Pick<CycleRunner, "getLastReport" | "getHedgeState" | "getPhase">;
  db?: Database | null;
  rpcClient?: Pick<BasePublicClient, "getBlock" | "getChainId">;
}

const checkDatabase = async (db: Database): Promise<CheckResult> => {
  try {
    await db.execute(sql`SELECT 1`);
    return { status: "healthy" };
  } catch (error) {
    return {
      status: "unhealthy",
      error: error instanceof Error ? error.message : String(error),
    };
  }
};

const checkRpc = async (
  client: Pick<BasePublicClient, "getBlock" | "getChainId">,
): Promise<CheckResult & { blockNumber?: string; blockAgeSec?: string }> => {
  const result = await checkRpcHealth(client);
  return {
    status: result.status,
    blockNumber: result.blockNumber?.toString(),
    blockAgeSec: result.blockAgeSec?.toString(),
    ...(result.status === "unhealthy" && result.error ? { error: result.error } : {}),
  };
};

export const createHealthRoute = (deps: HealthRouteDeps): Hono => {
  const health = new Hono();

  health.get("/", async (c) => {
    const checks: Record<string, CheckResult> = {};
    if (deps.db) {
      checks.database = await checkDatabase(deps.db);
    }
    if (deps.rpcClient) {
      checks.rpc = await checkRpc(deps.rpcClient);
    }

    const allHealthy = Object.values(checks).every((check) => check.status === "healthy");
    const report = deps.runner.getLastReport();
    const hedgeState = deps.runner.getHedgeState();

    const body = {
      status: allHealthy ? ("healthy" as const) : ("unhealthy" as const),
      timestamp: new Date().toISOString(),
      phase: deps.runner.getPhase(),
      hedge: {
        currentHedge: hedgeState.currentHedge,
        lastLpDelta: hedgeState.lastLpDelta,
        dailyTradeCount: hedgeState.dailyTradeCount,
        tradingDay: hedgeState.tradingDay,
        pendingReconcile: hedgeState.pendingReconcile,
      },
      lastCycle: report
        ? {
            cycle: report.cycle,
            status: report.status,
            abortReason: report.abortReason,
            finishedAt: report.finishedAt.toISOString(),
            positionCount: report.positionCount,
            highestRiskLevel: report.highestRiskLevel,
            aggregateDelta: report.aggregateDelta,
            netExposure: report.netExposure,
          }
        : null,
      checks,
    };

    return c.json(body, allHealthy ? 200 : 503);
  });

  return health;
};
