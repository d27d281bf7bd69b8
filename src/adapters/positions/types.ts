/**
 * Position source interface.
 */

import type { Address } from "viem";

import type { Position } from "@/domains/position";

export interface PositionSource {
  /** Stable source name for logs and metrics, e.g. "uniswap-v3" */
  readonly name: string;
  fetchPositions(owner: Address): Promise<Position[]>;
}

export interface SourceFailure {
  source: string;
  error: Error;
}

export interface FetchPositionsResult {
  positions: Position[];
  /** Sources that failed after retries, dropped for this cycle */
  failures: SourceFailure[];
  /** Number of sources that answered */
  succeeded: number;
}
