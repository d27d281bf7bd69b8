/**
 * Parallel fan-out over every configured position source.
 *
 * Each source is retried on its own; a source that still fails is dropped
 * for the cycle and reported in `failures`. Duplicate position ids keep
 * the first occurrence so no position is counted twice.
 */

import type { Address } from "viem";

import type { Position } from "@/domains/position";
import { type Logger, toError } from "@/lib/logger";
import { type BackoffConfig, withRetry } from "@/lib/resilience";

import type { FetchPositionsResult, PositionSource, SourceFailure } from "./types";

export interface FetchAllPositionsOptions {
  logger: Logger;
  maxAttempts?: number;
  backoff?: BackoffConfig;
  signal?: AbortSignal;
}

export const fetchAllPositions = async (
  sources: readonly PositionSource[],
  owner: Address,
  options: FetchAllPositionsOptions,
): Promise<FetchPositionsResult> => {
  const { logger, maxAttempts, backoff, signal } = options;

  const settled = await Promise.allSettled(
    sources.map((source) =>
      withRetry(() => source.fetchPositions(owner), {
        operation: `${source.name}.fetchPositions`,
        maxAttempts,
        backoff,
        logger,
        signal,
      }),
    ),
  );

  const positions: Position[] = [];
  const failures: SourceFailure[] = [];
  const seen = new Set<string>();

  settled.forEach((result, index) => {
    const source = sources[index]?.name ?? `source-${index}`;

    if (result.status === "rejected") {
      const error = toError(result.reason);
      logger.error("Position source failed", error, { source });
      failures.push({ source, error });
      return;
    }

    for (const position of result.value) {
      if (seen.has(position.id)) {
        logger.warn("Duplicate position skipped", { source, positionId: position.id });
        continue;
      }
      seen.add(position.id);
      positions.push(position);
    }
  });

  logger.debug("Positions fetched", {
    positions: positions.length,
    sources: sources.length,
    failed: failures.length,
  });

  return { positions, failures, succeeded: sources.length - failures.length };
};
