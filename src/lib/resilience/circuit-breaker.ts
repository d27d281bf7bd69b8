/**
 * Circuit breaker around cockatiel.
 *
 * A breaker sits in front of each external dependency (RPC node, position
 * API, hedge venue) so a dead dependency fails fast instead of stalling
 * every cycle on timeouts.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleAll,
} from "cockatiel";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive failures before the circuit opens */
  failureThreshold: number;
  /** Time in ms before a trial call is let through */
  resetTimeoutMs: number;
}

export interface CircuitBreaker {
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  isOpen: () => boolean;
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
};

export class CircuitOpenError extends Error {
  public readonly code = "CIRCUIT_OPEN";

  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitOpenError";
  }
}

const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    default:
      return "CLOSED";
  }
};

/**
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({ failureThreshold: 5, resetTimeoutMs: 30000 });
 * const mids = await breaker.execute(() => info.allMids());
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs } = config;

  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const listeners = new Set<(state: CircuitBreakerState) => void>();

  breaker.onStateChange((state) => {
    const mapped = mapCircuitState(state);
    for (const listener of listeners) {
      listener(mapped);
    }
  });

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await breaker.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(`Circuit breaker is open after ${failureThreshold} failures`);
      }
      throw error;
    }
  };

  return {
    execute,
    getState: () => mapCircuitState(breaker.state),
    isOpen: () => breaker.state === CircuitState.Open,
    onStateChange: (callback) => {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    },
  };
};
