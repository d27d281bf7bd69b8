export type {
  HedgeAdjustment,
  HedgeDecision,
  HedgeReason,
  HedgeSizingInput,
  NoHedgeAction,
  OrderSide,
} from "./types";

export {
  calculateCloseAdjustment,
  calculateHedgeAdjustment,
  clampSize,
  toOrderSide,
} from "./sizing";
