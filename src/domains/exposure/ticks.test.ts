import { describe, expect, it } from "vitest";

import { priceToTick, sqrtPriceX96ToPrice, tickToPrice } from "./ticks";

describe("tickToPrice", () => {
  it("should return 1 at tick 0 for equal decimals", () => {
    expect(tickToPrice(0, 18, 18)).toBe(1);
  });

  it("should rescale by the decimal difference", () => {
    expect(tickToPrice(0, 18, 6)).toBe(1e12);
  });

  it("should grow by one basis point per tick", () => {
    expect(tickToPrice(1, 0, 0)).toBeCloseTo(1.0001, 12);
  });
});

describe("sqrtPriceX96ToPrice", () => {
  it("should decode Q64.96 sqrt prices", () => {
    expect(sqrtPriceX96ToPrice(2n ** 96n, 18, 18)).toBe(1);
    expect(sqrtPriceX96ToPrice(2n ** 97n, 0, 0)).toBe(4);
  });

  it("should rescale by the decimal difference", () => {
    expect(sqrtPriceX96ToPrice(2n ** 96n, 18, 6)).toBe(1e12);
  });
});

describe("priceToTick", () => {
  it("should invert tickToPrice", () => {
    expect(priceToTick(1, 18, 18)).toBe(0);
    expect(priceToTick(tickToPrice(1000, 0, 0), 0, 0)).toBe(1000);
    expect(priceToTick(tickToPrice(-1000, 0, 0), 0, 0)).toBe(-1000);
  });

  it("should round down between ticks", () => {
    expect(priceToTick(1.00015, 0, 0)).toBe(1);
  });

  it("should return null for non-positive prices", () => {
    expect(priceToTick(0, 18, 6)).toBeNull();
    expect(priceToTick(-5, 18, 6)).toBeNull();
  });
});
