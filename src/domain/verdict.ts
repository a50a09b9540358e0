/**
 * Verdict domain model.
 *
 * Outcomes are data: a validation run always returns a GraphVerdict, even
 * when every edge is incompatible.
 */

import { DependencyEdge } from './component';
import { TypedError } from './errors';
import { RangeState } from './version';

export enum EdgeOutcome {
  Compatible = 'compatible',
  Degraded = 'degraded',
  RequiresOverride = 'requires-override',
  Incompatible = 'incompatible',
}

/** Severity rank used only for aggregation. */
export const OUTCOME_SEVERITY: Record<EdgeOutcome, number> = {
  [EdgeOutcome.Compatible]: 0,
  [EdgeOutcome.Degraded]: 1,
  [EdgeOutcome.RequiresOverride]: 2,
  [EdgeOutcome.Incompatible]: 3,
};

export enum MatrixDecision {
  Allow = 'allow',
  AllowWithOverride = 'allow-with-override',
  Deny = 'deny',
}

export interface EdgeVerdict {
  edge: DependencyEdge;
  outcome: EdgeOutcome;
  /** Present for every outcome other than compatible. */
  reason?: string;
  /** Matrix cell consulted, absent when evaluation stopped earlier. */
  decision?: MatrixDecision;
  consumerVersion?: string;
  producerVersion?: string;
  consumerState?: RangeState;
  producerState?: RangeState;
  error?: TypedError;
}

export interface GraphVerdict {
  outcome: EdgeOutcome;
  /** Every edge verdict, in the caller's edge order. */
  edges: EdgeVerdict[];
  /** Edges whose outcome is not compatible, in the caller's edge order. */
  offending: EdgeVerdict[];
}

/** The more severe of two outcomes. */
export function worseOutcome(a: EdgeOutcome, b: EdgeOutcome): EdgeOutcome {
  return OUTCOME_SEVERITY[b] > OUTCOME_SEVERITY[a] ? b : a;
}

/** Aggregate edge verdicts into a whole-graph verdict. */
export function aggregateVerdict(edges: EdgeVerdict[]): GraphVerdict {
  let outcome = EdgeOutcome.Compatible;
  for (const verdict of edges) {
    outcome = worseOutcome(outcome, verdict.outcome);
  }
  return {
    outcome,
    edges,
    offending: edges.filter((v) => v.outcome !== EdgeOutcome.Compatible),
  };
}

/** Whether the loader may be invoked for a graph with this verdict. */
export function isLinkable(verdict: GraphVerdict): boolean {
  return verdict.outcome !== EdgeOutcome.Incompatible;
}
