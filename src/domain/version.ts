/**
 * Version and range-state domain model.
 *
 * A component declares a semantic version together with a lifecycle tier.
 * The tier is not a severity: which tiers may interact is decided by the
 * compatibility matrix, never by comparing enum members.
 */

/** Lifecycle tier of a component version. */
export enum RangeState {
  Legacy = 'legacy',
  Stable = 'stable',
  Experimental = 'experimental',
}

export const RANGE_STATES: readonly RangeState[] = [
  RangeState.Legacy,
  RangeState.Stable,
  RangeState.Experimental,
];

export function isRangeState(value: unknown): value is RangeState {
  return RANGE_STATES.some((state) => state === value);
}

/** Parsed semantic version. Instances are frozen by the parser. */
export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  /** Dot-separated prerelease identifiers, without the leading "-". */
  readonly prerelease?: string;
}
