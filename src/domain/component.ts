/**
 * Component and dependency declarations.
 */

import { RangeState, Version } from './version';

/** A declared component version. Identity is `id`. */
export interface Component {
  readonly id: string;
  readonly version: Version;
  readonly rangeState: RangeState;
  /** Whether live instances may be replaced at runtime. Defaults to true. */
  readonly hotSwapEnabled?: boolean;
}

/** A consumer's declared dependency on a producer. */
export interface DependencyEdge {
  readonly consumerId: string;
  readonly producerId: string;
  /** Constraint text, e.g. ">=1.0.0 <2.0.0" or "^1.2.0". */
  readonly versionConstraint: string;
  /** Producer range states the consumer explicitly opts into. */
  readonly requiredRangeStates: readonly RangeState[];
}

export function componentKey(component: Component): string {
  const { major, minor, patch, prerelease } = component.version;
  const base = `${component.id}@${major}.${minor}.${patch}`;
  return prerelease ? `${base}-${prerelease}` : base;
}

export function edgeKey(edge: DependencyEdge): string {
  return `${edge.consumerId}->${edge.producerId}`;
}
