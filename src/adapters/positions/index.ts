/**
 * Position source exports.
 */

export type { FetchPositionsResult, PositionSource, SourceFailure } from "./types";

export { PositionSourceError } from "./errors";
export type { PositionSourceErrorCode } from "./errors";

export { fetchAllPositions, type FetchAllPositionsOptions } from "./fetch";

export {
  createPositionSources,
  type PositionSourcesConfig,
  type PositionSourcesDependencies,
} from "./factory";

export {
  createPositionManagerSource,
  createTokenCache,
  type PositionManagerSourceConfig,
  type TokenCache,
} from "./position-manager";

export {
  createAerodromeReader,
  createUniswapV3Reader,
  type PoolState,
  type PositionManagerProtocol,
  type PositionManagerReader,
  type RawPosition,
} from "./readers";

export { createVfatSource, vfatPositionSchema, vfatResponseSchema, type VfatSourceConfig } from "./vfat";
