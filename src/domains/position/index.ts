export type { Position, PositionProtocol, TokenInfo } from "./types";

export {
  addressSchema,
  isPosition,
  positionProtocolSchema,
  positionSchema,
  tokenInfoSchema,
} from "./types";
