import { describe, expect, it } from "vitest";

import {
  calculateDownsideRisk,
  calculateFeeAdjustedPnl,
  calculateFeeValue,
  calculatePositionValue,
  calculateValueAtRisk,
  getZScore,
} from "./value";

describe("calculatePositionValue", () => {
  it("should value token0 at the current price", () => {
    expect(calculatePositionValue(2, 1000, 2000)).toBe(5000);
  });
});

describe("calculateFeeValue", () => {
  it("should convert token0 fees into quote", () => {
    expect(calculateFeeValue(0.01, 5, 2000)).toBe(25);
  });
});

describe("calculateFeeAdjustedPnl", () => {
  it("should subtract the quote value of the loss from fees", () => {
    expect(calculateFeeAdjustedPnl(25, 0.01, 10_000)).toBe(-75);
  });
});

describe("getZScore", () => {
  it("should pick the quantile for the confidence level", () => {
    expect(getZScore(0.999)).toBe(2.33);
    expect(getZScore(0.99)).toBe(2.33);
    expect(getZScore(0.95)).toBe(1.65);
    expect(getZScore(0.9)).toBe(1.28);
  });
});

describe("calculateValueAtRisk", () => {
  it("should scale annual volatility to the horizon", () => {
    expect(calculateValueAtRisk(10_000, 0.5, 0.95, 1)).toBeCloseTo(
      10_000 * 0.5 * 1.65 * Math.sqrt(1 / 365),
      9,
    );
  });

  it("should use a full year at a 365 day horizon", () => {
    expect(calculateValueAtRisk(1000, 0.2, 0.99, 365)).toBeCloseTo(466, 9);
  });

  it("should return zero without value or volatility", () => {
    expect(calculateValueAtRisk(0, 0.5, 0.95, 1)).toBe(0);
    expect(calculateValueAtRisk(1000, 0, 0.95, 1)).toBe(0);
  });
});

describe("calculateDownsideRisk", () => {
  it("should use a two standard deviation move", () => {
    expect(calculateDownsideRisk(1000, 0.5, 365)).toBe(1000);
  });

  it("should return zero for non-positive value", () => {
    expect(calculateDownsideRisk(-5, 0.5, 1)).toBe(0);
  });
});
