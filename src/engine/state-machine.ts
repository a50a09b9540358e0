/**
 * Swap state machine.
 *
 * Enforces legal lifecycle transitions for component instances, producing
 * typed errors on illegal ones.
 */

import { SwapState, VALID_SWAP_TRANSITIONS } from '../domain/swap';
import { TypedError, invalidSwapTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newState?: S;
  error?: TypedError;
}

export function transitionSwapState(current: SwapState, target: SwapState): TransitionResult<SwapState> {
  const validTargets = VALID_SWAP_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: invalidSwapTransitionError(current, target, validTargets) };
  }
  return { success: true, newState: target };
}

/** Failed and retired instances never transition again, except failed -> retired. */
export function isTerminalSwapState(state: SwapState): boolean {
  return state === SwapState.Failed || state === SwapState.Retired;
}

/** States in which an instance accepts new work. */
export function acceptsWork(state: SwapState): boolean {
  return state === SwapState.Active;
}

/** States that hold the per-component swap slot. */
export function isSwapInFlight(state: SwapState): boolean {
  return state === SwapState.Draining || state === SwapState.Swapping;
}
