export {
  calculateBackoffMs,
  DEFAULT_BACKOFF_CONFIG,
  isRetryableError,
  isRetryableStatusCode,
  type BackoffConfig,
} from "./backoff";

export {
  CircuitOpenError,
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";

export {
  createRequestPolicy,
  DEFAULT_TIMEOUT_MS,
  RequestTimeoutError,
  withTimeout,
  type ExecuteOptions,
  type RequestPolicy,
  type RequestPolicyConfig,
} from "./request-policy";

export {
  DEFAULT_MAX_ATTEMPTS,
  MaxRetriesExceededError,
  sleep,
  withRetry,
  type RetryOptions,
} from "./retry";
