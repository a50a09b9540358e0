/**
 * Hot-swap domain model.
 *
 * Lifecycle of a live component instance:
 *   active -> draining -> swapping -> retired (replaced)
 *                 |           |
 *                 +-----------+--> active (rolled back)
 * A candidate whose activation throws is recorded as failed. Failed and
 * retired are terminal for that instance.
 */

import { Component } from './component';
import { TypedError } from './errors';
import { MatrixDecision } from './verdict';

export enum SwapState {
  Active = 'active',
  Draining = 'draining',
  Swapping = 'swapping',
  Failed = 'failed',
  Retired = 'retired',
}

export const VALID_SWAP_TRANSITIONS: Record<SwapState, SwapState[]> = {
  [SwapState.Active]: [SwapState.Draining, SwapState.Retired],
  [SwapState.Draining]: [SwapState.Swapping, SwapState.Active],
  [SwapState.Swapping]: [SwapState.Active, SwapState.Retired],
  [SwapState.Failed]: [SwapState.Retired],
  [SwapState.Retired]: [],
};

export interface SwapTransitionRecord {
  instanceId: string;
  from: SwapState | null;
  to: SwapState;
  at: string;
}

/** Snapshot of one instance in a slot's history. */
export interface InstanceSnapshot {
  instanceId: string;
  component: Component;
  state: SwapState;
  inFlight: number;
  createdAt: string;
}

/** Snapshot of a component slot. */
export interface SlotSnapshot {
  componentId: string;
  active: InstanceSnapshot;
  /** Instances that have left service, oldest first. */
  history: InstanceSnapshot[];
  swapInProgress: boolean;
}

/** Result of a swap request. Failures are values, never thrown. */
export interface SwapOutcome {
  success: boolean;
  componentId: string;
  traceId: string;
  fromVersion?: string;
  toVersion: string;
  /** Version serving after the request settled. */
  servingVersion?: string;
  decision?: MatrixDecision;
  /** Set when the matrix allowed the swap only with an audit override. */
  overrideApplied: boolean;
  transitions: SwapTransitionRecord[];
  durationMs: number;
  error?: TypedError;
}

/** Result of an explicit decommission. */
export interface RetireOutcome {
  success: boolean;
  componentId: string;
  traceId: string;
  /** Instances moved to retired by this call. */
  retiredInstanceIds: string[];
  error?: TypedError;
}

/** Caller-supplied activation of a candidate instance (the loader seam). */
export type ActivationHook = (candidate: Component) => Promise<void> | void;
