/**
 * Compatibility matrix.
 *
 * A fixed 3x3 table keyed by (consumer range state, producer range state).
 * The table is frozen at module load and is the only source of truth for
 * range-state interaction; nothing derives legality from enum order.
 *
 *   consumer \ producer   legacy                stable   experimental
 *   legacy                allow                 allow    deny
 *   stable                allow-with-override   allow    deny*
 *   experimental          allow-with-override   allow    allow
 *
 * (*) relaxable: an explicit opt-in turns it into allow-with-override.
 */

import { MatrixDecision } from '../domain/verdict';
import { RANGE_STATES, RangeState } from '../domain/version';

export interface MatrixCell {
  readonly decision: MatrixDecision;
  /** Whether an explicit opt-in may relax a deny to allow-with-override. */
  readonly relaxable: boolean;
}

export type CompatibilityTable = Readonly<Record<RangeState, Readonly<Record<RangeState, MatrixCell>>>>;

function cell(decision: MatrixDecision, relaxable = false): MatrixCell {
  return Object.freeze({ decision, relaxable });
}

export const COMPATIBILITY_MATRIX: CompatibilityTable = Object.freeze({
  [RangeState.Legacy]: Object.freeze({
    [RangeState.Legacy]: cell(MatrixDecision.Allow),
    [RangeState.Stable]: cell(MatrixDecision.Allow),
    [RangeState.Experimental]: cell(MatrixDecision.Deny),
  }),
  [RangeState.Stable]: Object.freeze({
    [RangeState.Legacy]: cell(MatrixDecision.AllowWithOverride),
    [RangeState.Stable]: cell(MatrixDecision.Allow),
    [RangeState.Experimental]: cell(MatrixDecision.Deny, true),
  }),
  [RangeState.Experimental]: Object.freeze({
    [RangeState.Legacy]: cell(MatrixDecision.AllowWithOverride),
    [RangeState.Stable]: cell(MatrixDecision.Allow),
    [RangeState.Experimental]: cell(MatrixDecision.Allow),
  }),
});

/** Raw table decision for a consumer/producer pair. */
export function lookup(consumer: RangeState, producer: RangeState): MatrixDecision {
  return COMPATIBILITY_MATRIX[consumer][producer].decision;
}

export interface ResolveOptions {
  /** The edge or request explicitly opts into the producer's range state. */
  optIn?: boolean;
  /** Engine-wide opt-in for every relaxable cell. */
  allowExperimentalOverride?: boolean;
  /** Deny every pair whose range states differ. */
  strictMode?: boolean;
}

/**
 * Effective decision after applying opt-ins and strict mode.
 *
 * Strict mode denies any cross-state pair before opt-ins are considered.
 */
export function resolveDecision(
  consumer: RangeState,
  producer: RangeState,
  options: ResolveOptions = {},
): MatrixDecision {
  if (options.strictMode && consumer !== producer) return MatrixDecision.Deny;
  const entry = COMPATIBILITY_MATRIX[consumer][producer];
  if (entry.decision === MatrixDecision.Deny && entry.relaxable && (options.optIn || options.allowExperimentalOverride)) {
    return MatrixDecision.AllowWithOverride;
  }
  return entry.decision;
}

/** Every (consumer, producer) pair with its table decision. */
export function listMatrix(): Array<{ consumer: RangeState; producer: RangeState; decision: MatrixDecision; relaxable: boolean }> {
  return RANGE_STATES.flatMap((consumer) =>
    RANGE_STATES.map((producer) => ({ consumer, producer, ...COMPATIBILITY_MATRIX[consumer][producer] })),
  );
}
