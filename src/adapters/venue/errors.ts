/**
 * Venue client error types.
 */

export type VenueErrorCode =
  | "NETWORK_ERROR"
  | "ORDER_REJECTED"
  | "INSUFFICIENT_MARGIN"
  | "UNKNOWN_SYMBOL"
  | "INVALID_RESPONSE"
  | "UNKNOWN";

const RETRYABLE_CODES: readonly VenueErrorCode[] = ["NETWORK_ERROR", "UNKNOWN"];

export class VenueError extends Error {
  public override readonly name = "VenueError";

  /** Read by isRetryableError at the request-policy boundary */
  public readonly retryable: boolean;

  constructor(
    message: string,
    public readonly code: VenueErrorCode,
    public readonly venue: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
    this.retryable = RETRYABLE_CODES.includes(code);
  }
}
