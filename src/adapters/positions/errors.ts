/**
 * Position source error types.
 */

import { isRetryableError, isRetryableStatusCode } from "@/lib/resilience";

export type PositionSourceErrorCode = "RPC_ERROR" | "HTTP_ERROR" | "INVALID_RESPONSE";

const isRetryableSourceFailure = (
  code: PositionSourceErrorCode,
  cause: unknown,
  status: number | undefined,
): boolean => {
  switch (code) {
    case "RPC_ERROR":
      return isRetryableError(cause);
    case "HTTP_ERROR":
      return status === undefined || isRetryableStatusCode(status);
    case "INVALID_RESPONSE":
      return false;
  }
};

export class PositionSourceError extends Error {
  public override readonly name = "PositionSourceError";

  /** Read by isRetryableError inside withRetry */
  public readonly retryable: boolean;

  constructor(
    message: string,
    public readonly code: PositionSourceErrorCode,
    public readonly source: string,
    public override readonly cause?: unknown,
    public readonly status?: number,
  ) {
    super(message, { cause });
    this.retryable = isRetryableSourceFailure(code, cause, status);
  }
}
