/**
 * Run state machine.
 *
 * Enforces valid run state transitions, producing a typed error on an
 * invalid one.
 */

import { RunState, VALID_RUN_TRANSITIONS } from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult {
  success: boolean;
  newState?: RunState;
  error?: TypedError;
}

/** Attempt a run state transition. */
export function transitionRunState(current: RunState, target: RunState): TransitionResult {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newState: target };
}

/** Check if a run state is terminal. */
export function isTerminalRunState(state: RunState): boolean {
  return state === RunState.Complete || state === RunState.Failed;
}
