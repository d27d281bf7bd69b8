/**
 * Exponential backoff and retry classification for the I/O boundary
 * (position sources and venue queries).
 */

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Upper bound for any single delay (ms) */
  maxDelayMs: number;
  /** Growth factor per attempt */
  multiplier: number;
  /** Random spread added on top of the delay, as a fraction (0-1) */
  jitterFactor: number;
}

/**
 * Boundary default: 1s, doubling, capped at 30s, 10% jitter.
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Delay before retry number `attempt` (0-indexed).
 *
 * @example
 * ```typescript
 * calculateBackoffMs(0); // ~1000
 * calculateBackoffMs(1); // ~2000
 * calculateBackoffMs(2); // ~4000
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => {
  const { initialDelayMs, maxDelayMs, multiplier, jitterFactor } = config;
  const cappedDelayMs = Math.min(initialDelayMs * multiplier ** attempt, maxDelayMs);
  const jitter = cappedDelayMs * jitterFactor * Math.random();
  return Math.floor(cappedDelayMs + jitter);
};

const RETRYABLE_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504]);

const NON_RETRYABLE_STATUS_CODES = new Set([400, 401, 403, 404, 422]);

export const isRetryableStatusCode = (statusCode: number): boolean =>
  RETRYABLE_STATUS_CODES.has(statusCode);

/**
 * Error names that already represent a final boundary outcome.
 */
const NON_RETRYABLE_ERROR_NAMES = new Set([
  "CircuitOpenError",
  "MaxRetriesExceededError",
  "ValiError",
]);

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const NON_RETRYABLE_PATTERNS = [
  "insufficient margin",
  "insufficient balance",
  "invalid signature",
  "order rejected",
  "unknown symbol",
  "execution reverted",
];

const getStatusCode = (err: object): number | undefined => {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
};

/**
 * Decide whether an error from an RPC or HTTP call is worth another attempt.
 *
 * Unknown errors count as retryable; schema failures, reverts and
 * explicit rejections do not.
 */
export const isRetryableError = (error: unknown): boolean => {
  if (error === null || typeof error !== "object") {
    return true;
  }

  if ("name" in error && typeof error.name === "string") {
    if (NON_RETRYABLE_ERROR_NAMES.has(error.name)) {
      return false;
    }
  }

  if ("retryable" in error && typeof error.retryable === "boolean") {
    return error.retryable;
  }

  const statusCode = getStatusCode(error);
  if (statusCode !== undefined) {
    if (NON_RETRYABLE_STATUS_CODES.has(statusCode)) {
      return false;
    }
    if (RETRYABLE_STATUS_CODES.has(statusCode)) {
      return true;
    }
  }

  if ("code" in error && typeof error.code === "string" && NETWORK_ERROR_CODES.has(error.code)) {
    return true;
  }

  if ("message" in error && typeof error.message === "string") {
    const message = error.message.toLowerCase();
    if (NON_RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
      return false;
    }
  }

  return true;
};
