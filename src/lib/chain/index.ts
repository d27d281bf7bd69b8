export {
  BASE_CHAIN,
  BASE_CHAIN_ID,
  DEFAULT_BASE_RPC_URL,
  DEFAULT_BLOCK_STALE_THRESHOLD_SEC,
  UNISWAP_V3_POSITION_MANAGER_BASE,
} from "./constants";
export { createBasePublicClient, type BasePublicClient } from "./client";
export { checkRpcHealth } from "./health";

export type { RpcHealthOptions, RpcHealthStatus } from "./health";
