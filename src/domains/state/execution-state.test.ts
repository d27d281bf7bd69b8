import { describe, expect, it } from "vitest";

import {
  EXECUTION_TERMINAL_STATES,
  type HedgeExecution,
  createHedgeExecution,
  isTerminalExecutionStatus,
  transitionExecution,
} from "./execution-state";

const NOW = new Date("2026-03-14T10:00:00.000Z");

const createTestExecution = (overrides?: Partial<HedgeExecution>): HedgeExecution => ({
  ...createHedgeExecution({
    id: "exec-1",
    symbol: "ETH",
    reason: "threshold_breach",
    requestedAdjustment: -0.13,
    side: "SELL",
    size: 0.13,
    reduceOnly: false,
    now: NOW,
  }),
  ...overrides,
});

const expectOk = (result: ReturnType<typeof transitionExecution>): HedgeExecution => {
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.state;
};

describe("execution state machine", () => {
  describe("createHedgeExecution", () => {
    it("should start PROPOSED with no fill", () => {
      const execution = createTestExecution();

      expect(execution.status).toBe("PROPOSED");
      expect(execution.filledSize).toBe(0);
      expect(execution.limitPrice).toBeNull();
      expect(execution.transitions).toEqual([]);
    });
  });

  describe("isTerminalExecutionStatus", () => {
    it("should treat every outcome as terminal", () => {
      for (const status of EXECUTION_TERMINAL_STATES) {
        expect(isTerminalExecutionStatus(status)).toBe(true);
      }
      expect(isTerminalExecutionStatus("SUBMITTED")).toBe(false);
    });
  });

  describe("transitionExecution", () => {
    it("should walk PROPOSED -> VALIDATED -> SUBMITTED -> FILLED and record each step", () => {
      const later = new Date("2026-03-14T10:00:01.000Z");
      let execution = createTestExecution();

      execution = expectOk(
        transitionExecution(execution, { type: "VALIDATE", limitPrice: 1990, midPrice: 2000 }, NOW),
      );
      execution = expectOk(transitionExecution(execution, { type: "SUBMIT" }, NOW));
      execution = expectOk(
        transitionExecution(
          execution,
          { type: "FILL", orderId: "77", filledSize: 0.13, avgPrice: 1999 },
          later,
        ),
      );

      expect(execution.status).toBe("FILLED");
      expect(execution.limitPrice).toBe(1990);
      expect(execution.midPrice).toBe(2000);
      expect(execution.orderId).toBe("77");
      expect(execution.avgPrice).toBe(1999);
      expect(execution.updatedAt).toBe(later);
      expect(execution.transitions).toEqual([
        { from: "PROPOSED", to: "VALIDATED", at: NOW },
        { from: "VALIDATED", to: "SUBMITTED", at: NOW },
        { from: "SUBMITTED", to: "FILLED", at: later },
      ]);
    });

    it("should reject from PROPOSED with a reason", () => {
      const result = transitionExecution(createTestExecution(), {
        type: "REJECT",
        reason: "daily_limit",
        message: "Daily trade limit reached (100)",
      });

      const execution = expectOk(result);
      expect(execution.status).toBe("REJECTED");
      expect(execution.rejectReason).toBe("daily_limit");
    });

    it("should skip from PROPOSED", () => {
      const result = transitionExecution(createTestExecution(), {
        type: "SKIP",
        message: "Below minimum order size",
      });

      expect(expectOk(result).status).toBe("SKIPPED");
    });

    it("should not submit before validation", () => {
      expect(transitionExecution(createTestExecution(), { type: "SUBMIT" })).toEqual({
        ok: false,
        error: "Invalid transition: PROPOSED -> SUBMITTED",
      });
    });

    it("should not fill a validated order that was never submitted", () => {
      const result = transitionExecution(createTestExecution({ status: "VALIDATED" }), {
        type: "FILL",
        orderId: null,
        filledSize: 1,
        avgPrice: null,
      });

      expect(result).toEqual({ ok: false, error: "Invalid transition: VALIDATED -> FILLED" });
    });

    it("should not leave a terminal state", () => {
      const result = transitionExecution(createTestExecution({ status: "FAILED" }), {
        type: "FAIL",
        error: "again",
      });

      expect(result).toEqual({ ok: false, error: "Cannot transition from terminal state: FAILED" });
    });
  });
});
