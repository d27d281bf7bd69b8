import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import * as breakerModule from "./circuit-breaker";
import { CircuitOpenError, createCircuitBreaker } from "./circuit-breaker";

const failing = async (): Promise<string> => {
  throw new Error("rpc down");
};

describe("createCircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should start closed", () => {
    const breaker = createCircuitBreaker();
    expect(breaker.getState()).toBe("CLOSED");
    expect(breaker.isOpen()).toBe(false);
  });

  it("should pass results and errors through while closed", async () => {
    const breaker = createCircuitBreaker();
    await expect(breaker.execute(async () => "slot0")).resolves.toBe("slot0");
    await expect(breaker.execute(failing)).rejects.toThrow("rpc down");
  });

  it("should open after consecutive failures and fail fast", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 2, resetTimeoutMs: 10000 });

    await expect(breaker.execute(failing)).rejects.toThrow("rpc down");
    await expect(breaker.execute(failing)).rejects.toThrow("rpc down");

    const fn = vi.fn(async () => "never");
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
    expect(breaker.getState()).toBe("OPEN");
  });

  it("should close again after a successful trial call", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 1, resetTimeoutMs: 5000 });
    await expect(breaker.execute(failing)).rejects.toThrow("rpc down");
    expect(breaker.isOpen()).toBe(true);

    vi.advanceTimersByTime(5001);

    await expect(breaker.execute(async () => "ok")).resolves.toBe("ok");
    expect(breaker.getState()).toBe("CLOSED");
  });

  it("should notify state listeners until unsubscribed", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 1, resetTimeoutMs: 5000 });
    const listener = vi.fn();
    const unsubscribe = breaker.onStateChange(listener);

    await expect(breaker.execute(failing)).rejects.toThrow("rpc down");
    expect(listener).toHaveBeenCalledWith("OPEN");

    unsubscribe();
    vi.advanceTimersByTime(5001);
    await breaker.execute(async () => "ok");
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe("circuit breaker configs", () => {
  it("should export only the shared default", () => {
    expect(Object.keys(breakerModule).filter((name) => name.endsWith("_CONFIG"))).toEqual([
      "DEFAULT_CIRCUIT_BREAKER_CONFIG",
    ]);
  });
});
