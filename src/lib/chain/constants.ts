import { base } from "viem/chains";

export const BASE_CHAIN = base;
export const BASE_CHAIN_ID = 8453;
export const DEFAULT_BASE_RPC_URL = "https://mainnet.base.org";
export const DEFAULT_BLOCK_STALE_THRESHOLD_SEC = 60n;

/** Uniswap V3 NonfungiblePositionManager on Base */
export const UNISWAP_V3_POSITION_MANAGER_BASE = "0x03a520b32C04BF3bEEf7BEb72E919cf822Ed34f1";
