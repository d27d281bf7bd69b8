/**
 * State machine exports.
 */

// Shared types
export type { TransitionRecord, TransitionResult } from "./types";
export { isTransitionOk } from "./types";

// Hedge state
export type { HedgeState } from "./hedge-state";
export {
  applyFill,
  createHedgeState,
  hedgeStateSchema,
  isHedgeState,
  markPendingReconcile,
  reconcileHedge,
  recordLpDelta,
  rollTradingDay,
  toTradingDay,
} from "./hedge-state";

// Execution state machine
export type {
  ExecutionEvent,
  ExecutionStatus,
  HedgeExecution,
  RejectReason,
} from "./execution-state";
export {
  createHedgeExecution,
  EXECUTION_TERMINAL_STATES,
  EXECUTION_TRANSITIONS,
  executionStatusSchema,
  isExecutionStatus,
  isTerminalExecutionStatus,
  rejectReasonSchema,
  transitionExecution,
} from "./execution-state";

// Cycle state machine
export type { CyclePhase } from "./cycle-state";
export {
  CYCLE_TRANSITIONS,
  cyclePhaseSchema,
  isCyclePhase,
  isTerminalCyclePhase,
  transitionCycle,
} from "./cycle-state";
