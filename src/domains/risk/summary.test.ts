import { describe, expect, it } from "vitest";

import { buildRiskReport, summarizeRisk } from "./summary";
import type { RiskMetrics } from "./types";

const createMetrics = (overrides?: Partial<RiskMetrics>): RiskMetrics => ({
  positionId: "uniswap-v3:1",
  price: 2000,
  delta: 0.1,
  gamma: -0.0001,
  amount0: 0.1,
  amount1: 200,
  valueQuote: 400,
  impermanentLoss: 0.01,
  impermanentLossQuote: 4,
  feesQuote: 6,
  netPnlQuote: 2,
  valueAtRiskQuote: 17,
  downsideRiskQuote: 21,
  deltaRatio: 0.5,
  needsRebalance: false,
  riskLevel: "LOW",
  reasons: [],
  ...overrides,
});

describe("summarizeRisk", () => {
  it("should sum deltas and totals across positions", () => {
    const summary = summarizeRisk([
      createMetrics({ delta: 0.1 }),
      createMetrics({ positionId: "aerodrome:7", delta: 0.05, riskLevel: "MEDIUM" }),
      createMetrics({ positionId: "vfat:3", delta: -0.02, netPnlQuote: -5 }),
    ]);

    expect(summary.positionCount).toBe(3);
    expect(summary.aggregateDelta).toBeCloseTo(0.13, 12);
    expect(summary.totalValueQuote).toBe(1200);
    expect(summary.totalImpermanentLossQuote).toBe(12);
    expect(summary.totalFeesQuote).toBe(18);
    expect(summary.totalNetPnlQuote).toBe(-1);
    expect(summary.highestRiskLevel).toBe("MEDIUM");
    expect(summary.rebalanceRequested).toBe(false);
  });

  it("should request a rebalance when any position needs one", () => {
    const summary = summarizeRisk([createMetrics(), createMetrics({ needsRebalance: true })]);

    expect(summary.rebalanceRequested).toBe(true);
  });

  it("should return an empty summary for no positions", () => {
    expect(summarizeRisk([])).toEqual({
      positionCount: 0,
      aggregateDelta: 0,
      totalValueQuote: 0,
      totalImpermanentLossQuote: 0,
      totalFeesQuote: 0,
      totalNetPnlQuote: 0,
      highestRiskLevel: "LOW",
      rebalanceRequested: false,
    });
  });
});

describe("buildRiskReport", () => {
  it("should express impermanent loss in percent and join reasons", () => {
    const report = buildRiskReport(
      createMetrics({
        impermanentLoss: 0.25,
        riskLevel: "HIGH",
        reasons: ["Impermanent loss 25.00% exceeds 5.00%", "Fees do not cover impermanent loss"],
      }),
    );

    expect(report.impermanentLossPercent).toBe(25);
    expect(report.riskLevel).toBe("HIGH");
    expect(report.reasons).toBe(
      "Impermanent loss 25.00% exceeds 5.00%; Fees do not cover impermanent loss",
    );
  });
});
