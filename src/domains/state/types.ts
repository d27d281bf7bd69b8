/**
 * Shared types for state machine transitions.
 */

/**
 * Result type for state machine transitions.
 *
 * Returns either a successful transition with the new state, or an error.
 */
export type TransitionResult<T> =
  | { ok: true; state: T; from: string; to: string }
  | { ok: false; error: string };

/**
 * One recorded transition, kept on the entity for the audit trail.
 */
export interface TransitionRecord<S extends string = string> {
  from: S;
  to: S;
  at: Date;
}

export const isTransitionOk = <T>(
  result: TransitionResult<T>,
): result is { ok: true; state: T; from: string; to: string } => result.ok;
