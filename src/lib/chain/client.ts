import { http, createPublicClient } from "viem";

import { BASE_CHAIN } from "./constants";

import type { HttpTransport, PublicClient } from "viem";

export type BasePublicClient = PublicClient<HttpTransport, typeof BASE_CHAIN>;

/**
 * Read-only Base client. Multicall batching folds the per-position
 * contract reads of one cycle into a few RPC requests.
 */
export const createBasePublicClient = (rpcUrl: string): BasePublicClient =>
  createPublicClient({
    chain: BASE_CHAIN,
    transport: http(rpcUrl),
    batch: { multicall: true },
  });
