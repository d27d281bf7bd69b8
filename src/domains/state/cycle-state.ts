/**
 * Cycle phase state machine for the control loop.
 *
 * IDLE -> FETCHING -> ASSESSING -> DECIDING -> EXECUTING -> REPORTING -> IDLE.
 * FETCHING may abort back to IDLE, DECIDING skips to REPORTING when no
 * action is needed, and every phase may move to SHUTTING_DOWN.
 */

import * as v from "valibot";

import type { TransitionResult } from "./types";

export type CyclePhase =
  | "IDLE"
  | "FETCHING"
  | "ASSESSING"
  | "DECIDING"
  | "EXECUTING"
  | "REPORTING"
  | "SHUTTING_DOWN";

export const CYCLE_TRANSITIONS: Record<CyclePhase, CyclePhase[]> = {
  IDLE: ["FETCHING", "SHUTTING_DOWN"],
  FETCHING: ["ASSESSING", "IDLE", "SHUTTING_DOWN"], // Can abort
  ASSESSING: ["DECIDING", "SHUTTING_DOWN"],
  DECIDING: ["EXECUTING", "REPORTING", "SHUTTING_DOWN"],
  EXECUTING: ["REPORTING", "SHUTTING_DOWN"],
  REPORTING: ["IDLE", "SHUTTING_DOWN"],
  SHUTTING_DOWN: [], // Terminal state
};

export const isTerminalCyclePhase = (phase: CyclePhase): boolean => phase === "SHUTTING_DOWN";

export const transitionCycle = (
  current: CyclePhase,
  next: CyclePhase,
): TransitionResult<CyclePhase> => {
  if (isTerminalCyclePhase(current)) {
    return {
      ok: false,
      error: `Cannot transition from terminal phase: ${current}`,
    };
  }

  if (!CYCLE_TRANSITIONS[current].includes(next)) {
    return {
      ok: false,
      error: `Invalid transition: ${current} -> ${next}`,
    };
  }

  return { ok: true, state: next, from: current, to: next };
};

export const cyclePhaseSchema = v.picklist([
  "IDLE",
  "FETCHING",
  "ASSESSING",
  "DECIDING",
  "EXECUTING",
  "REPORTING",
  "SHUTTING_DOWN",
] as const);

export const isCyclePhase = (value: unknown): value is CyclePhase =>
  v.is(cyclePhaseSchema, value);
