/**
 * Retry wrapper applied at the I/O boundary only. Decision logic never retries.
 */

import type { Logger } from "../logger";
import { type BackoffConfig, DEFAULT_BACKOFF_CONFIG, calculateBackoffMs, isRetryableError } from "./backoff";

export interface RetryOptions {
  /** Label used in logs and in the exhausted error message */
  operation: string;
  /** Total attempts including the first one */
  maxAttempts?: number;
  backoff?: BackoffConfig;
  retryable?: (error: unknown) => boolean;
  logger?: Pick<Logger, "debug" | "warn">;
  signal?: AbortSignal;
}

/**
 * Thrown when every attempt failed with a retryable error.
 * Non-retryable errors are rethrown as they are.
 */
export class MaxRetriesExceededError extends Error {
  public readonly code = "MAX_RETRIES_EXCEEDED";

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(message, { cause: lastError });
    this.name = "MaxRetriesExceededError";
  }
}

export const DEFAULT_MAX_ATTEMPTS = 3;

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn` up to `maxAttempts` times with exponential backoff between attempts.
 *
 * @example
 * ```typescript
 * const positions = await withRetry(() => source.fetchPositions(owner), {
 *   operation: "uniswap-v3.fetchPositions",
 * });
 * ```
 */
export const withRetry = async <T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> => {
  const {
    operation,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    backoff = DEFAULT_BACKOFF_CONFIG,
    retryable = isRetryableError,
    logger,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new MaxRetriesExceededError(`${operation} aborted`, attempt, lastError);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!retryable(error)) {
        throw error;
      }

      if (attempt + 1 >= maxAttempts) {
        break;
      }

      const delayMs = calculateBackoffMs(attempt, backoff);
      logger?.warn(`${operation} failed, retrying`, {
        attempt: attempt + 1,
        maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs);
    }
  }

  throw new MaxRetriesExceededError(
    `${operation} failed after ${maxAttempts} attempts`,
    maxAttempts,
    lastError,
  );
};
