import { describe, expect, it, vi } from "vitest";

import { tickToPrice } from "@/domains/exposure";
import { calculateConcentratedImpermanentLoss } from "@/domains/metrics";
import type { Position } from "@/domains/position";

import { assessPosition, calculateDeltaRatio } from "./assess";
import { DEFAULT_HEDGER_CONFIG } from "./config";

const TOKEN0 = {
  address: "0x4200000000000000000000000000000000000006",
  symbol: "WETH",
  decimals: 0,
} as const;

const TOKEN1 = {
  address: "0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913",
  symbol: "USDC",
  decimals: 0,
} as const;

// Zero decimals keep prices at 1.0001^tick: tick 6932 is ~2, tick -6932 is ~0.5
const createPosition = (overrides?: Partial<Position>): Position => ({
  id: "uniswap-v3:1",
  protocol: "uniswap-v3",
  token0: TOKEN0,
  token1: TOKEN1,
  liquidity: 1000n,
  tickLower: -6932,
  tickUpper: 6932,
  currentTick: 0,
  price: 1,
  unclaimedFees0: 0,
  unclaimedFees1: 0,
  ...overrides,
});

const context = {
  entryPrice: 1,
  volatility: 0.5,
  config: DEFAULT_HEDGER_CONFIG,
};

describe("calculateDeltaRatio", () => {
  it("should divide delta notional by value", () => {
    expect(calculateDeltaRatio(-2, 100, 400)).toBe(0.5);
  });

  it("should be zero for a worthless position", () => {
    expect(calculateDeltaRatio(1, 100, 0)).toBe(0);
  });
});

describe("assessPosition", () => {
  it("should rate a below-range position with no loss as HIGH on delta alone", () => {
    const metrics = assessPosition(
      createPosition({ tickLower: 0, price: 0.5, currentTick: -6932 }),
      { ...context, entryPrice: 0.5 },
    );

    expect(metrics.amount1).toBe(0);
    expect(metrics.delta).toBe(metrics.amount0);
    expect(metrics.gamma).toBe(0);
    expect(metrics.valueQuote).toBe(metrics.amount0 * 0.5);
    expect(metrics.deltaRatio).toBe(1);
    expect(metrics.impermanentLoss).toBe(0);
    expect(metrics.netPnlQuote).toBe(0);
    expect(metrics.needsRebalance).toBe(true);
    expect(metrics.riskLevel).toBe("HIGH");
    expect(metrics.reasons).toEqual(["Delta ratio 1.0000 exceeds 0.5"]);
  });

  it("should rate an above-range position with no loss as LOW", () => {
    const metrics = assessPosition(createPosition({ tickLower: 0, price: 3, currentTick: 11000 }), {
      ...context,
      entryPrice: 3,
    });

    expect(metrics.delta).toBe(0);
    expect(metrics.valueQuote).toBe(metrics.amount1);
    expect(metrics.deltaRatio).toBe(0);
    expect(metrics.needsRebalance).toBe(false);
    expect(metrics.riskLevel).toBe("LOW");
    expect(metrics.reasons).toEqual([]);
  });

  it("should apply range-aware impermanent loss in range", () => {
    const position = createPosition({ price: 1.5, currentTick: 4055 });
    const metrics = assessPosition(position, context);

    const expectedLoss = calculateConcentratedImpermanentLoss({
      currentPrice: 1.5,
      lowerPrice: tickToPrice(-6932, 0, 0),
      upperPrice: tickToPrice(6932, 0, 0),
      entryPrice: 1,
    });
    expect(metrics.impermanentLoss).toBe(expectedLoss);
    expect(metrics.impermanentLossQuote).toBe(expectedLoss * metrics.valueQuote);
    expect(metrics.netPnlQuote).toBe(-expectedLoss * metrics.valueQuote);
    expect(metrics.gamma).toBeLessThan(0);
    // ~3.4% loss with no fees exceeds the 2% loss ratio
    expect(metrics.riskLevel).toBe("HIGH");
  });

  it("should count token0 fees at the current price", () => {
    const metrics = assessPosition(
      createPosition({ price: 1.5, currentTick: 4055, unclaimedFees0: 100, unclaimedFees1: 850 }),
      context,
    );

    expect(metrics.feesQuote).toBe(1000);
    expect(metrics.netPnlQuote).toBeGreaterThan(0);
    // Fees cover the loss; moderate loss and delta ratio remain
    expect(metrics.riskLevel).toBe("MEDIUM");
    expect(metrics.reasons).toHaveLength(2);
  });

  it("should compute value at risk and downside risk from value", () => {
    const metrics = assessPosition(createPosition(), context);
    const horizon = Math.sqrt(1 / 365);

    expect(metrics.valueAtRiskQuote).toBeCloseTo(metrics.valueQuote * 0.5 * 1.65 * horizon, 9);
    expect(metrics.downsideRiskQuote).toBeCloseTo(metrics.valueQuote * 0.5 * horizon * 2, 9);
  });

  it("should return neutral metrics and warn for a position without a price", () => {
    const logger = { warn: vi.fn() };
    const metrics = assessPosition(createPosition({ price: 0 }), { ...context, logger });

    expect(logger.warn).toHaveBeenCalledWith("Position has no usable price", {
      positionId: "uniswap-v3:1",
      price: 0,
    });
    expect(metrics.delta).toBe(0);
    expect(metrics.valueQuote).toBe(0);
    expect(metrics.riskLevel).toBe("LOW");
  });
});
