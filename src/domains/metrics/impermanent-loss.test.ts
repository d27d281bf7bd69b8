import { describe, expect, it, vi } from "vitest";

import {
  calculateConcentratedImpermanentLoss,
  calculateImpermanentLoss,
} from "./impermanent-loss";

describe("calculateImpermanentLoss", () => {
  it("should be zero when the price is unchanged", () => {
    expect(calculateImpermanentLoss(2000, 2000)).toBe(0);
  });

  it("should match the closed form for a 4x move", () => {
    // r = 4: 2 * 2 / 5 - 1 = -0.2
    expect(calculateImpermanentLoss(100, 400)).toBeCloseTo(0.2, 12);
  });

  it("should be symmetric in the ratio", () => {
    expect(calculateImpermanentLoss(400, 100)).toBeCloseTo(calculateImpermanentLoss(100, 400), 12);
  });

  it("should return zero for non-positive prices", () => {
    expect(calculateImpermanentLoss(0, 100)).toBe(0);
    expect(calculateImpermanentLoss(100, -1)).toBe(0);
  });
});

describe("calculateConcentratedImpermanentLoss", () => {
  it("should amplify the plain loss inside the range", () => {
    // base IL for r = 1.21: 2 * 1.1 / 2.21 - 1
    const baseLoss = Math.abs(2.2 / 2.21 - 1);
    // width 1000, mid 2000: factor 2 / 0.5 = 4
    const result = calculateConcentratedImpermanentLoss({
      entryPrice: 2000,
      currentPrice: 2420,
      lowerPrice: 1500,
      upperPrice: 2500,
    });

    expect(result).toBeCloseTo(baseLoss * 4, 12);
  });

  it("should return the plain loss out of range", () => {
    const result = calculateConcentratedImpermanentLoss({
      entryPrice: 2000,
      currentPrice: 3000,
      lowerPrice: 1500,
      upperPrice: 2500,
    });

    expect(result).toBe(calculateImpermanentLoss(2000, 3000));
  });

  it("should cap the loss at 1", () => {
    const result = calculateConcentratedImpermanentLoss({
      entryPrice: 100,
      currentPrice: 399,
      lowerPrice: 398,
      upperPrice: 400,
    });

    expect(result).toBe(1);
  });

  it("should return zero and warn for an inverted range", () => {
    const logger = { warn: vi.fn() };
    const result = calculateConcentratedImpermanentLoss(
      { entryPrice: 2000, currentPrice: 2100, lowerPrice: 2500, upperPrice: 1500 },
      logger,
    );

    expect(result).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("Invalid range for impermanent loss", {
      lowerPrice: 2500,
      upperPrice: 1500,
    });
  });

  it("should return zero for an empty range", () => {
    expect(
      calculateConcentratedImpermanentLoss({
        entryPrice: 2000,
        currentPrice: 2000,
        lowerPrice: 2000,
        upperPrice: 2000,
      }),
    ).toBe(0);
  });

  it("should return zero and warn when the mid price is not positive", () => {
    const logger = { warn: vi.fn() };
    const result = calculateConcentratedImpermanentLoss(
      { entryPrice: 1, currentPrice: 1, lowerPrice: -3, upperPrice: 1 },
      logger,
    );

    expect(result).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
