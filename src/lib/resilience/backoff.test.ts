import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { calculateBackoffMs, isRetryableError, isRetryableStatusCode } from "./backoff";
import { CircuitOpenError } from "./circuit-breaker";

describe("calculateBackoffMs", () => {
  beforeEach(() => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const noJitter = { initialDelayMs: 500, maxDelayMs: 3000, multiplier: 2, jitterFactor: 0 };

  it("should grow exponentially", () => {
    expect(calculateBackoffMs(0, noJitter)).toBe(500);
    expect(calculateBackoffMs(1, noJitter)).toBe(1000);
    expect(calculateBackoffMs(2, noJitter)).toBe(2000);
  });

  it("should cap at maxDelayMs", () => {
    expect(calculateBackoffMs(3, noJitter)).toBe(3000);
    expect(calculateBackoffMs(12, noJitter)).toBe(3000);
  });

  it("should add jitter on top of the delay", () => {
    // 1000 + 1000 * 0.1 * 0.5
    expect(calculateBackoffMs(0)).toBe(1050);
  });
});

describe("isRetryableStatusCode", () => {
  it("should retry throttling and server errors", () => {
    expect(isRetryableStatusCode(429)).toBe(true);
    expect(isRetryableStatusCode(503)).toBe(true);
  });

  it("should not retry client errors", () => {
    expect(isRetryableStatusCode(400)).toBe(false);
    expect(isRetryableStatusCode(404)).toBe(false);
  });
});

describe("isRetryableError", () => {
  it("should retry network errors", () => {
    expect(isRetryableError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe(
      true,
    );
  });

  it("should follow an explicit retryable flag", () => {
    expect(isRetryableError(Object.assign(new Error("x"), { retryable: false }))).toBe(false);
    expect(isRetryableError(Object.assign(new Error("x"), { retryable: true }))).toBe(true);
  });

  it("should use HTTP status when present", () => {
    expect(isRetryableError({ status: 502 })).toBe(true);
    expect(isRetryableError({ statusCode: 401 })).toBe(false);
  });

  it("should not retry an open circuit", () => {
    expect(isRetryableError(new CircuitOpenError())).toBe(false);
  });

  it("should not retry reverts and margin rejections", () => {
    expect(isRetryableError(new Error("Execution reverted: invalid token ID"))).toBe(false);
    expect(isRetryableError(new Error("Insufficient margin to place order"))).toBe(false);
  });

  it("should retry unknown errors", () => {
    expect(isRetryableError(new Error("something odd"))).toBe(true);
    expect(isRetryableError("string error")).toBe(true);
  });
});
