export {
  calculateLimitPrice,
  calculateRequiredMargin,
  executeHedgeDecision,
} from "./execute-hedge";
export { emergencyClose } from "./emergency-close";
export type {
  EmergencyCloseParams,
  EmergencyCloseResult,
  ExecuteHedgeParams,
  ExecutionConfig,
  ExecutionDeps,
  ExecutionErrorCode,
  ExecutionOutcome,
} from "./types";
export { ExecutionError } from "./types";
