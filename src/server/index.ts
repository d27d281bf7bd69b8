import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { BasePublicClient } from "@/lib/chain";
import type { Database } from "@/lib/db";
import type { Logger } from "@/lib/logger";
import type { EmergencyCloseResult } from "@/worker/execution";
import type { CycleRunner, EmergencyCloseOptions } from "@/worker/orchestrator";

import { createAdminRoute } from "./routes/admin";
import { createHealthRoute } from "./routes/health";
import { type MetricsStore, createMetricsRoute } from "./routes/metrics";

export interface ServerDeps {
  port: number;
  logger: Logger;
  runner: Pick<CycleRunner, "getLastReport" | "getHedgeState" | "getPhase">;
  metrics: MetricsStore;
  emergencyClose: (options?: EmergencyCloseOptions) => Promise<EmergencyCloseResult>;
  db?: Database | null;
  rpcClient?: Pick<BasePublicClient, "getBlock" | "getChainId">;
  /** Enables /admin when set */
  adminToken?: string;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: Omit<ServerDeps, "port">): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    deps.metrics.recordHttpRequest(duration);
  });

  app.get("/", (c) => c.json({ message: "LP Delta Hedger API" }));
  app.route(
    "/health",
    createHealthRoute({ runner: deps.runner, db: deps.db, rpcClient: deps.rpcClient }),
  );
  app.route("/metrics", createMetricsRoute(deps.metrics));

  if (deps.adminToken) {
    app.route(
      "/admin",
      createAdminRoute({
        token: deps.adminToken,
        logger: deps.logger,
        emergencyClose: deps.emergencyClose,
      }),
    );
  }

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};

export { createMetricsStore, type MetricsStore } from "./routes/metrics";
