import { BASE_CHAIN_ID, DEFAULT_BLOCK_STALE_THRESHOLD_SEC } from "./constants";

import type { BasePublicClient } from "./client";

export type RpcHealthStatus =
  | { status: "healthy"; blockNumber: bigint; blockAgeSec: bigint; chainId: number }
  | {
      status: "unhealthy";
      blockNumber?: bigint;
      blockAgeSec?: bigint;
      chainId?: number;
      error?: string;
    };

export interface RpcHealthOptions {
  thresholdSec?: bigint;
  expectedChainId?: number;
}

export const checkRpcHealth = async (
  client: Pick<BasePublicClient, "getBlock" | "getChainId">,
  options: RpcHealthOptions = {},
): Promise<RpcHealthStatus> => {
  const { thresholdSec = DEFAULT_BLOCK_STALE_THRESHOLD_SEC, expectedChainId = BASE_CHAIN_ID } =
    options;

  try {
    const [block, chainId] = await Promise.all([client.getBlock(), client.getChainId()]);
    const now = BigInt(Math.floor(Date.now() / 1000));
    const blockAgeSec = now - block.timestamp;

    if (chainId !== expectedChainId) {
      return {
        status: "unhealthy",
        blockNumber: block.number,
        blockAgeSec,
        chainId,
        error: `Connected to chain ${chainId}, expected ${expectedChainId}`,
      };
    }

    if (blockAgeSec > thresholdSec) {
      return {
        status: "unhealthy",
        blockNumber: block.number,
        blockAgeSec,
        chainId,
        error: `Block age ${blockAgeSec}s exceeds threshold ${thresholdSec}s`,
      };
    }

    return {
      status: "healthy",
      blockNumber: block.number,
      blockAgeSec,
      chainId,
    };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return {
      status: "unhealthy",
      error,
    };
  }
};
