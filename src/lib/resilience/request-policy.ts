/**
 * Boundary policy for one external dependency: timeout, then circuit
 * breaker, then retry with backoff.
 *
 * Order submission passes `retry: false`; a resubmitted order after an
 * ambiguous failure could double the hedge.
 */

import type { Logger } from "../logger";
import { type BackoffConfig, DEFAULT_BACKOFF_CONFIG, isRetryableError } from "./backoff";
import {
  type CircuitBreakerConfig,
  type CircuitBreakerState,
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  createCircuitBreaker,
} from "./circuit-breaker";
import { DEFAULT_MAX_ATTEMPTS, withRetry } from "./retry";

export interface RequestPolicyConfig {
  /** Dependency name for logs, e.g. "hyperliquid" or "base-rpc" */
  name: string;
  circuitBreaker?: CircuitBreakerConfig;
  backoff?: BackoffConfig;
  maxAttempts?: number;
  timeoutMs?: number;
  logger?: Pick<Logger, "debug" | "info" | "warn">;
}

export interface ExecuteOptions {
  /** Operation label, e.g. "getHedgePosition" */
  operation: string;
  timeoutMs?: number;
  /** Set false for calls that must never be repeated */
  retry?: boolean;
}

export interface RequestPolicy {
  execute: <T>(fn: () => Promise<T>, options: ExecuteOptions) => Promise<T>;
  getCircuitState: () => CircuitBreakerState;
}

export class RequestTimeoutError extends Error {
  public readonly code = "REQUEST_TIMEOUT";

  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "RequestTimeoutError";
  }
}

export const DEFAULT_TIMEOUT_MS = 10000;

export const withTimeout = <T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> =>
  new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new RequestTimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    fn()
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });

const isRetryableThroughBreaker = (error: unknown): boolean =>
  !(error instanceof CircuitOpenError) && isRetryableError(error);

/**
 * @example
 * ```typescript
 * const policy = createRequestPolicy({ name: "hyperliquid", logger });
 * const state = await policy.execute(() => info.clearinghouseState({ user }), {
 *   operation: "clearinghouseState",
 * });
 * ```
 */
export const createRequestPolicy = (config: RequestPolicyConfig): RequestPolicy => {
  const {
    name,
    circuitBreaker: breakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    backoff = DEFAULT_BACKOFF_CONFIG,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    timeoutMs: defaultTimeoutMs = DEFAULT_TIMEOUT_MS,
    logger,
  } = config;

  const breaker = createCircuitBreaker(breakerConfig);

  breaker.onStateChange((state) => {
    if (state === "OPEN") {
      logger?.warn("Circuit breaker opened", { dependency: name });
    } else if (state === "CLOSED") {
      logger?.info("Circuit breaker closed", { dependency: name });
    }
  });

  const execute = <T>(fn: () => Promise<T>, options: ExecuteOptions): Promise<T> => {
    const { operation, timeoutMs = defaultTimeoutMs, retry = true } = options;
    const attempt = (): Promise<T> => breaker.execute(() => withTimeout(fn, timeoutMs));

    if (!retry) {
      return attempt();
    }

    return withRetry(attempt, {
      operation: `${name}.${operation}`,
      maxAttempts,
      backoff,
      retryable: isRetryableThroughBreaker,
      logger,
    });
  };

  return {
    execute,
    getCircuitState: breaker.getState,
  };
};
