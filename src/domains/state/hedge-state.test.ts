import { describe, expect, it } from "vitest";

import {
  type HedgeState,
  applyFill,
  createHedgeState,
  isHedgeState,
  markPendingReconcile,
  reconcileHedge,
  recordLpDelta,
  rollTradingDay,
  toTradingDay,
} from "./hedge-state";

const DAY_ONE = new Date("2026-03-14T23:59:00.000Z");
const DAY_TWO = new Date("2026-03-15T00:01:00.000Z");

describe("hedge state", () => {
  describe("toTradingDay", () => {
    it("should use the UTC calendar day", () => {
      expect(toTradingDay(DAY_ONE)).toBe("2026-03-14");
      expect(toTradingDay(DAY_TWO)).toBe("2026-03-15");
    });
  });

  describe("createHedgeState", () => {
    it("should start flat with no trades", () => {
      expect(createHedgeState(DAY_ONE)).toEqual({
        currentHedge: 0,
        lastLpDelta: 0,
        dailyTradeCount: 0,
        tradingDay: "2026-03-14",
        pendingReconcile: false,
      });
    });
  });

  describe("applyFill", () => {
    it("should move the hedge by the signed fill and count the trade", () => {
      const state = applyFill(createHedgeState(DAY_ONE, -0.1), -0.03);

      expect(state.currentHedge).toBeCloseTo(-0.13, 12);
      expect(state.dailyTradeCount).toBe(1);
    });

    it("should not mutate the previous state", () => {
      const before = createHedgeState(DAY_ONE);
      applyFill(before, 1);

      expect(before.currentHedge).toBe(0);
      expect(before.dailyTradeCount).toBe(0);
    });
  });

  describe("rollTradingDay", () => {
    it("should keep the count within the same day", () => {
      const state = applyFill(createHedgeState(DAY_ONE), 1);

      expect(rollTradingDay(state, new Date("2026-03-14T12:00:00.000Z"))).toBe(state);
    });

    it("should reset the count once when the day changes", () => {
      const state: HedgeState = { ...createHedgeState(DAY_ONE), dailyTradeCount: 5 };

      const rolled = rollTradingDay(state, DAY_TWO);
      expect(rolled.dailyTradeCount).toBe(0);
      expect(rolled.tradingDay).toBe("2026-03-15");

      const again = rollTradingDay(applyFill(rolled, 1), DAY_TWO);
      expect(again.dailyTradeCount).toBe(1);
    });

    it("should leave the hedge untouched", () => {
      const state = createHedgeState(DAY_ONE, -2);

      expect(rollTradingDay(state, DAY_TWO).currentHedge).toBe(-2);
    });
  });

  describe("reconciliation", () => {
    it("should flag and then adopt the venue position", () => {
      const flagged = markPendingReconcile(createHedgeState(DAY_ONE, -1));
      expect(flagged.pendingReconcile).toBe(true);

      const reconciled = reconcileHedge(flagged, -0.4);
      expect(reconciled.pendingReconcile).toBe(false);
      expect(reconciled.currentHedge).toBe(-0.4);
      expect(reconciled.dailyTradeCount).toBe(0);
    });
  });

  describe("recordLpDelta", () => {
    it("should store the last LP delta", () => {
      expect(recordLpDelta(createHedgeState(DAY_ONE), 0.13).lastLpDelta).toBe(0.13);
    });
  });

  describe("isHedgeState", () => {
    it("should accept a valid state and reject a malformed one", () => {
      expect(isHedgeState(createHedgeState(DAY_ONE))).toBe(true);
      expect(isHedgeState({ ...createHedgeState(DAY_ONE), dailyTradeCount: -1 })).toBe(false);
    });
  });
});
