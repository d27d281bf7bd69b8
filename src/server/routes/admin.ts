import { Hono } from "hono";
import { bearerAuth } from "hono/bearer-auth";
import * as v from "valibot";

import { VenueError } from "@/adapters/venue";
import type { Logger } from "@/lib/logger";
import { toError } from "@/lib/logger";
import type { EmergencyCloseResult } from "@/worker/execution";
import type { EmergencyCloseOptions } from "@/worker/orchestrator";
import { QueueClosedError } from "@/worker/queue";

const emergencyCloseBodySchema = v.object({
  override: v.optional(v.boolean(), false),
});

export interface AdminRouteDeps {
  token: string;
  logger: Logger;
  emergencyClose: (options?: EmergencyCloseOptions) => Promise<EmergencyCloseResult>;
}

const parseBody = (raw: string): EmergencyCloseOptions | null => {
  if (raw.trim() === "") {
    return { override: false };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = v.safeParse(emergencyCloseBodySchema, json);
  return result.success ? result.output : null;
};

const serializeResult = (result: EmergencyCloseResult) => {
  const execution = result.outcome?.execution;
  return {
    cancelledOrders: result.cancelledOrders,
    venueHedge: result.venueHedge,
    signedFilledSize: result.outcome?.signedFilledSize ?? 0,
    execution: execution
      ? {
          id: execution.id,
          status: execution.status,
          side: execution.side,
          size: execution.size,
          filledSize: execution.filledSize,
          avgPrice: execution.avgPrice,
          rejectReason: execution.rejectReason,
          message: execution.message,
        }
      : null,
  };
};

/**
 * Operator endpoints. Mounted only when an admin token is configured.
 */
export const createAdminRoute = (deps: AdminRouteDeps): Hono => {
  const admin = new Hono();

  admin.use("*", bearerAuth({ token: deps.token }));

  admin.post("/emergency-close", async (c) => {
    const options = parseBody(await c.req.text());
    if (!options) {
      return c.json({ error: "Body must be empty or {\"override\": boolean}" }, 400);
    }

    deps.logger.warn("Emergency close requested via admin API", { override: options.override });

    try {
      const result = await deps.emergencyClose(options);
      return c.json(serializeResult(result), 200);
    } catch (error) {
      if (error instanceof QueueClosedError) {
        return c.json({ error: "Worker is shutting down" }, 503);
      }
      if (error instanceof VenueError) {
        deps.logger.error("Emergency close failed", error, { code: error.code });
        return c.json({ error: error.message, code: error.code }, 502);
      }
      throw toError(error);
    }
  });

  return admin;
};
