export {
  calculateConcentratedImpermanentLoss,
  calculateImpermanentLoss,
  type ConcentratedIlInput,
} from "./impermanent-loss";

export {
  calculateDownsideRisk,
  calculateFeeAdjustedPnl,
  calculateFeeValue,
  calculatePositionValue,
  calculateValueAtRisk,
  getZScore,
} from "./value";
