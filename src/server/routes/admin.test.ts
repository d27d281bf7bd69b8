import { beforeEach, describe, expect, it, vi } from "vitest";

import { VenueError } from "@/adapters/venue";
import { createHedgeExecution } from "@/domains/state";
import type { Logger } from "@/lib/logger";
import type { EmergencyCloseResult } from "@/worker/execution";
import { QueueClosedError } from "@/worker/queue";

import { createAdminRoute } from "./admin";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const TOKEN = "test-token";

const post = (body?: string, token: string | null = TOKEN): Request =>
  new Request("http://localhost/emergency-close", {
    method: "POST",
    headers: token ? { Authorization: `Bearer ${token}` } : {},
    body,
  });

describe("admin route", () => {
  const emergencyClose = vi.fn<(options?: { override?: boolean }) => Promise<EmergencyCloseResult>>();
  let logger: Logger;

  beforeEach(() => {
    emergencyClose.mockReset();
    logger = createMockLogger();
  });

  const app = () => createAdminRoute({ token: TOKEN, logger, emergencyClose });

  it("should reject requests without the bearer token", async () => {
    const res = await app().fetch(post(undefined, null));

    expect(res.status).toBe(401);
    expect(emergencyClose).not.toHaveBeenCalled();
  });

  it("should reject a wrong bearer token", async () => {
    const res = await app().fetch(post(undefined, "other-token"));

    expect(res.status).toBe(401);
    expect(emergencyClose).not.toHaveBeenCalled();
  });

  it("should close without override when the body is empty", async () => {
    emergencyClose.mockResolvedValue({ cancelledOrders: 0, venueHedge: 0, outcome: null });

    const res = await app().fetch(post());
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(emergencyClose).toHaveBeenCalledWith({ override: false });
    expect(body).toEqual({
      cancelledOrders: 0,
      venueHedge: 0,
      signedFilledSize: 0,
      execution: null,
    });
  });

  it("should pass the override flag and return the execution", async () => {
    const execution = createHedgeExecution({
      id: "exec-1",
      symbol: "ETH",
      reason: "emergency_close",
      requestedAdjustment: 0.4,
      side: "BUY",
      size: 0.4,
      reduceOnly: true,
      now: new Date("2024-01-01T00:00:00Z"),
    });
    emergencyClose.mockResolvedValue({
      cancelledOrders: 1,
      venueHedge: -0.4,
      outcome: {
        execution: { ...execution, status: "FILLED", filledSize: 0.4, avgPrice: 2001 },
        signedFilledSize: 0.4,
      },
    });

    const res = await app().fetch(post(JSON.stringify({ override: true })));
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(emergencyClose).toHaveBeenCalledWith({ override: true });
    expect(body).toEqual({
      cancelledOrders: 1,
      venueHedge: -0.4,
      signedFilledSize: 0.4,
      execution: {
        id: "exec-1",
        status: "FILLED",
        side: "BUY",
        size: 0.4,
        filledSize: 0.4,
        avgPrice: 2001,
        rejectReason: null,
        message: null,
      },
    });
  });

  it("should return 400 for a malformed body", async () => {
    const res = await app().fetch(post('{"override":"yes"}'));

    expect(res.status).toBe(400);
    expect(emergencyClose).not.toHaveBeenCalled();
  });

  it("should return 400 for invalid JSON", async () => {
    const res = await app().fetch(post("not json"));

    expect(res.status).toBe(400);
  });

  it("should return 502 when the venue fails", async () => {
    emergencyClose.mockRejectedValue(
      new VenueError("connection reset", "NETWORK_ERROR", "hyperliquid"),
    );

    const res = await app().fetch(post());
    const body: unknown = await res.json();

    expect(res.status).toBe(502);
    expect(body).toEqual({ error: "connection reset", code: "NETWORK_ERROR" });
    expect(logger.error).toHaveBeenCalledWith(
      "Emergency close failed",
      expect.any(VenueError),
      { code: "NETWORK_ERROR" },
    );
  });

  it("should return 503 once the worker has stopped accepting jobs", async () => {
    emergencyClose.mockRejectedValue(new QueueClosedError("emergency_close"));

    const res = await app().fetch(post());

    expect(res.status).toBe(503);
  });
});
