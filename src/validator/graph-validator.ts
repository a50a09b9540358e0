/**
 * Dependency graph validator.
 *
 * Evaluates every declared edge against version constraints and the
 * compatibility matrix, then folds the edge outcomes into the worst-case
 * graph verdict. Edges are independent of each other: cycles are legal and
 * edge order only affects the sequence of telemetry events.
 *
 * Malformed constraint text and duplicate component declarations are
 * rejected before any edge is evaluated; everything else, including a
 * missing producer, is reported inside the verdict.
 */

import { resolveDecision } from '../compat/matrix';
import { Component, DependencyEdge, edgeKey } from '../domain/component';
import { CompatError, unresolvedDependencyError } from '../domain/errors';
import {
  EdgeOutcome,
  EdgeVerdict,
  GraphVerdict,
  MatrixDecision,
  aggregateVerdict,
} from '../domain/verdict';
import { Logger, logger as rootLogger } from '../logger';
import { ComponentRegistry } from '../registry/component-registry';
import { Constraint, parseConstraint } from '../semver/constraint';
import { formatVersion } from '../semver/parser';
import { TelemetryEmitter } from '../telemetry/emitter';
import { TraceContext } from '../telemetry/trace';

export interface GraphValidatorOptions {
  emitter: TelemetryEmitter;
  allowExperimentalOverride?: boolean;
  logger?: Logger;
}

export interface ValidateOptions {
  /** Trace id to correlate this call's events with; generated when omitted. */
  traceId?: string;
}

/** Telemetry severity per edge outcome. */
export const OUTCOME_TELEMETRY_SEVERITY: Record<EdgeOutcome, number> = {
  [EdgeOutcome.Compatible]: 1,
  [EdgeOutcome.Degraded]: 2,
  [EdgeOutcome.RequiresOverride]: 3,
  [EdgeOutcome.Incompatible]: 5,
};

export class GraphValidator {
  private readonly emitter: TelemetryEmitter;
  private readonly allowExperimentalOverride: boolean;
  private readonly log: Logger;

  constructor(options: GraphValidatorOptions) {
    this.emitter = options.emitter;
    this.allowExperimentalOverride = options.allowExperimentalOverride ?? false;
    this.log = (options.logger ?? rootLogger).child({ component: 'graph-validator' });
  }

  validate(
    components: readonly Component[],
    edges: readonly DependencyEdge[],
    options: ValidateOptions = {},
  ): GraphVerdict {
    const trace = new TraceContext(options.traceId);

    const constraints: Constraint[] = [];
    for (const edge of edges) {
      constraints.push(this.guardInput(trace, [edge.consumerId, edge.producerId], () =>
        parseConstraint(edge.versionConstraint),
      ));
    }
    const registry = this.guardInput(trace, components.map((c) => c.id), () => new ComponentRegistry(components));

    const verdicts = edges.map((edge, i) => {
      const verdict = this.evaluateEdge(registry, edge, constraints[i]);
      this.emitter.emit(
        trace.event({
          kind: 'edge.evaluated',
          componentIds: [edge.consumerId, edge.producerId],
          verdict: verdict.outcome,
          severity: OUTCOME_TELEMETRY_SEVERITY[verdict.outcome],
          detail: {
            edge: edgeKey(edge),
            constraint: edge.versionConstraint,
            decision: verdict.decision,
            reason: verdict.reason,
            consumerVersion: verdict.consumerVersion,
            producerVersion: verdict.producerVersion,
            consumerState: verdict.consumerState,
            producerState: verdict.producerState,
            errorCode: verdict.error?.code,
          },
        }),
      );
      return verdict;
    });

    const graph = aggregateVerdict(verdicts);
    this.emitter.emit(
      trace.event({
        kind: 'graph.verdict',
        componentIds: uniqueSorted(components.map((c) => c.id)),
        verdict: graph.outcome,
        severity: OUTCOME_TELEMETRY_SEVERITY[graph.outcome],
        detail: {
          componentCount: components.length,
          edgeCount: edges.length,
          offendingCount: graph.offending.length,
          offending: graph.offending.map((v) => edgeKey(v.edge)),
        },
      }),
    );

    this.log.info('Dependency graph validated', {
      traceId: trace.traceId,
      outcome: graph.outcome,
      edgeCount: edges.length,
      offendingCount: graph.offending.length,
    });

    return graph;
  }

  private evaluateEdge(registry: ComponentRegistry, edge: DependencyEdge, constraint: Constraint): EdgeVerdict {
    const consumer = registry.latest(edge.consumerId);
    if (!consumer) {
      return {
        edge,
        outcome: EdgeOutcome.Incompatible,
        reason: `unresolved consumer: ${edge.consumerId}`,
        error: unresolvedDependencyError(edge.consumerId, 'consumer'),
      };
    }

    const base = {
      edge,
      consumerVersion: formatVersion(consumer.version),
      consumerState: consumer.rangeState,
    };

    const { match, latest } = registry.resolve(edge.producerId, constraint);
    if (!latest) {
      return {
        ...base,
        outcome: EdgeOutcome.Incompatible,
        reason: `unresolved producer: ${edge.producerId}`,
        error: unresolvedDependencyError(edge.producerId, 'producer'),
      };
    }
    if (!match) {
      return {
        ...base,
        outcome: EdgeOutcome.Incompatible,
        reason: 'version constraint unmet',
        producerVersion: formatVersion(latest.version),
        producerState: latest.rangeState,
      };
    }

    const producerState = match.rangeState;
    const optIn = edge.requiredRangeStates.includes(producerState);
    const decision = resolveDecision(consumer.rangeState, producerState, {
      optIn,
      allowExperimentalOverride: this.allowExperimentalOverride,
    });
    const resolved = {
      ...base,
      decision,
      producerVersion: formatVersion(match.version),
      producerState,
    };

    switch (decision) {
      case MatrixDecision.Deny:
        return {
          ...resolved,
          outcome: EdgeOutcome.Incompatible,
          reason: `${consumer.rangeState} consumer denies ${producerState} producer`,
        };
      case MatrixDecision.AllowWithOverride:
        return optIn
          ? { ...resolved, outcome: EdgeOutcome.Degraded, reason: `${producerState} producer accepted by explicit opt-in` }
          : {
              ...resolved,
              outcome: EdgeOutcome.RequiresOverride,
              reason: `${producerState} producer requires override for ${consumer.rangeState} consumer`,
            };
      case MatrixDecision.Allow:
        return { ...resolved, outcome: EdgeOutcome.Compatible };
    }
  }

  /** Run an input check; on CompatError emit validation.rejected and rethrow with the trace id. */
  private guardInput<T>(trace: TraceContext, componentIds: string[], check: () => T): T {
    try {
      return check();
    } catch (err) {
      if (!(err instanceof CompatError)) throw err;
      this.emitter.emit(
        trace.event({
          kind: 'validation.rejected',
          componentIds: uniqueSorted(componentIds),
          severity: 5,
          detail: { code: err.typedError.code, message: err.typedError.message },
        }),
      );
      this.log.warn('Validation input rejected', { traceId: trace.traceId, code: err.typedError.code });
      throw new CompatError({ ...err.typedError, traceId: trace.traceId });
    }
  }
}

function uniqueSorted(ids: string[]): string[] {
  return [...new Set(ids)].sort();
}
