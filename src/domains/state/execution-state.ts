/**
 * Execution state machine for a single hedge decision.
 *
 * PROPOSED -> VALIDATED -> SUBMITTED -> FILLED | REJECTED | FAILED, with
 * PROPOSED -> REJECTED (safety check), PROPOSED -> SKIPPED (below minimum
 * size) and PROPOSED -> FAILED (market data unavailable).
 */

import * as v from "valibot";

import type { HedgeReason, OrderSide } from "@/domains/hedging";

import type { TransitionRecord, TransitionResult } from "./types";

export type ExecutionStatus =
  | "PROPOSED"
  | "VALIDATED"
  | "SUBMITTED"
  | "FILLED"
  | "REJECTED"
  | "SKIPPED"
  | "FAILED";

export type RejectReason = "daily_limit" | "insufficient_margin" | "venue_rejected" | "not_filled";

/**
 * Valid transitions from each execution status.
 *
 * Terminal states have empty arrays.
 */
export const EXECUTION_TRANSITIONS: Record<ExecutionStatus, ExecutionStatus[]> = {
  PROPOSED: ["VALIDATED", "REJECTED", "SKIPPED", "FAILED"],
  VALIDATED: ["SUBMITTED"],
  SUBMITTED: ["FILLED", "REJECTED", "FAILED"],
  FILLED: [],
  REJECTED: [],
  SKIPPED: [],
  FAILED: [],
};

export const EXECUTION_TERMINAL_STATES: readonly ExecutionStatus[] = [
  "FILLED",
  "REJECTED",
  "SKIPPED",
  "FAILED",
] as const;

export type ExecutionEvent =
  | { type: "VALIDATE"; limitPrice: number; midPrice: number }
  | { type: "SKIP"; message: string }
  | { type: "REJECT"; reason: RejectReason; message: string }
  | { type: "SUBMIT" }
  | { type: "FILL"; orderId: string | null; filledSize: number; avgPrice: number | null }
  | { type: "FAIL"; error: string };

/**
 * A hedge decision on its way to the venue. `size` is unsigned; `side`
 * carries the direction.
 */
export interface HedgeExecution {
  id: string;
  symbol: string;
  reason: HedgeReason;
  side: OrderSide;
  /** Signed adjustment the decision asked for */
  requestedAdjustment: number;
  size: number;
  reduceOnly: boolean;
  midPrice: number | null;
  limitPrice: number | null;
  orderId: string | null;
  filledSize: number;
  avgPrice: number | null;
  status: ExecutionStatus;
  rejectReason: RejectReason | null;
  message: string | null;
  transitions: TransitionRecord<ExecutionStatus>[];
  createdAt: Date;
  updatedAt: Date;
}

export const isTerminalExecutionStatus = (status: ExecutionStatus): boolean =>
  EXECUTION_TERMINAL_STATES.includes(status);

const eventToStatus = (event: ExecutionEvent): ExecutionStatus => {
  switch (event.type) {
    case "VALIDATE":
      return "VALIDATED";
    case "SKIP":
      return "SKIPPED";
    case "REJECT":
      return "REJECTED";
    case "SUBMIT":
      return "SUBMITTED";
    case "FILL":
      return "FILLED";
    case "FAIL":
      return "FAILED";
  }
};

const applyEvent = (event: ExecutionEvent): Partial<HedgeExecution> => {
  switch (event.type) {
    case "VALIDATE":
      return { limitPrice: event.limitPrice, midPrice: event.midPrice };
    case "SKIP":
      return { message: event.message };
    case "REJECT":
      return { rejectReason: event.reason, message: event.message };
    case "SUBMIT":
      return {};
    case "FILL":
      return { orderId: event.orderId, filledSize: event.filledSize, avgPrice: event.avgPrice };
    case "FAIL":
      return { message: event.error };
  }
};

/**
 * Transition an execution based on an event, appending the transition to
 * its record.
 */
export const transitionExecution = (
  execution: HedgeExecution,
  event: ExecutionEvent,
  now: Date = new Date(),
): TransitionResult<HedgeExecution> => {
  if (isTerminalExecutionStatus(execution.status)) {
    return {
      ok: false,
      error: `Cannot transition from terminal state: ${execution.status}`,
    };
  }

  const targetStatus = eventToStatus(event);

  if (!EXECUTION_TRANSITIONS[execution.status].includes(targetStatus)) {
    return {
      ok: false,
      error: `Invalid transition: ${execution.status} -> ${targetStatus}`,
    };
  }

  const newState: HedgeExecution = {
    ...execution,
    ...applyEvent(event),
    status: targetStatus,
    transitions: [...execution.transitions, { from: execution.status, to: targetStatus, at: now }],
    updatedAt: now,
  };

  return {
    ok: true,
    state: newState,
    from: execution.status,
    to: targetStatus,
  };
};

export const createHedgeExecution = (params: {
  id: string;
  symbol: string;
  reason: HedgeReason;
  requestedAdjustment: number;
  side: OrderSide;
  size: number;
  reduceOnly: boolean;
  now: Date;
}): HedgeExecution => ({
  id: params.id,
  symbol: params.symbol,
  reason: params.reason,
  side: params.side,
  requestedAdjustment: params.requestedAdjustment,
  size: params.size,
  reduceOnly: params.reduceOnly,
  midPrice: null,
  limitPrice: null,
  orderId: null,
  filledSize: 0,
  avgPrice: null,
  status: "PROPOSED",
  rejectReason: null,
  message: null,
  transitions: [],
  createdAt: params.now,
  updatedAt: params.now,
});

export const executionStatusSchema = v.picklist([
  "PROPOSED",
  "VALIDATED",
  "SUBMITTED",
  "FILLED",
  "REJECTED",
  "SKIPPED",
  "FAILED",
] as const);

export const rejectReasonSchema = v.picklist([
  "daily_limit",
  "insufficient_margin",
  "venue_rejected",
  "not_filled",
] as const);

export const isExecutionStatus = (value: unknown): value is ExecutionStatus =>
  v.is(executionStatusSchema, value);
