/**
 * Hot-swap policy engine.
 *
 * Owns one slot per component id. A slot holds the serving instance and
 * the most recent instances that left service, bounded by `historyLimit`;
 * telemetry keeps the full record. A swap request walks the
 * serving instance through draining and swapping, consults the
 * compatibility matrix, runs the caller's activation hook and either
 * promotes the candidate or rolls back to the old instance.
 *
 * Per-id exclusion: the slot is claimed synchronously, before the first
 * await, so a second request for the same id observes the claim and is
 * rejected with SWAP.IN_PROGRESS. Slots of different ids are independent.
 *
 * Every rejected or failed request leaves the old instance active; the
 * candidate only becomes visible through a single assignment of
 * `slot.active` after activation succeeded.
 */

import { resolveDecision } from '../compat/matrix';
import { Component } from '../domain/component';
import {
  CompatError,
  TypedError,
  activationFailedError,
  alreadyRegisteredError,
  drainTimeoutError,
  policyRejectedError,
  swapInProgressError,
  swapNotApplicableError,
  swapNotFoundError,
  swapRetiredError,
} from '../domain/errors';
import {
  ActivationHook,
  RetireOutcome,
  SlotSnapshot,
  SwapOutcome,
  SwapState,
  SwapTransitionRecord,
} from '../domain/swap';
import { MatrixDecision } from '../domain/verdict';
import { Logger, errorMessage, logger as rootLogger } from '../logger';
import { formatVersion } from '../semver/parser';
import { TelemetryEmitter } from '../telemetry/emitter';
import { TraceContext } from '../telemetry/trace';
import { ComponentInstance } from './instance';
import { isSwapInFlight } from './state-machine';

export interface HotSwapEngineOptions {
  emitter: TelemetryEmitter;
  drainTimeoutMs: number;
  allowExperimentalOverride?: boolean;
  strictMode?: boolean;
  /** Defaults to DEFAULT_SLOT_HISTORY_LIMIT. */
  historyLimit?: number;
  logger?: Logger;
}

export interface SwapRequestOptions {
  traceId?: string;
  /** Per-request override of the engine's drain timeout. */
  drainTimeoutMs?: number;
}

interface Slot {
  componentId: string;
  active: ComponentInstance;
  history: ComponentInstance[];
  swapInProgress: boolean;
}

export const DEFAULT_SLOT_HISTORY_LIMIT = 20;

/** Telemetry severity of a rejected request, by error code. */
const REJECTION_SEVERITY: Record<string, number> = {
  'SWAP.POLICY_REJECTED': 4,
  'SWAP.DRAIN_TIMEOUT': 3,
  'SWAP.IN_PROGRESS': 2,
  'SWAP.NOT_APPLICABLE': 2,
  'SWAP.NOT_FOUND': 2,
  'SWAP.RETIRED': 2,
};

export class HotSwapEngine {
  private readonly emitter: TelemetryEmitter;
  private readonly drainTimeoutMs: number;
  private readonly allowExperimentalOverride: boolean;
  private readonly strictMode: boolean;
  private readonly historyLimit: number;
  private readonly log: Logger;
  private slots = new Map<string, Slot>();

  constructor(options: HotSwapEngineOptions) {
    this.emitter = options.emitter;
    this.drainTimeoutMs = options.drainTimeoutMs;
    this.allowExperimentalOverride = options.allowExperimentalOverride ?? false;
    this.strictMode = options.strictMode ?? false;
    this.historyLimit = options.historyLimit ?? DEFAULT_SLOT_HISTORY_LIMIT;
    this.log = (options.logger ?? rootLogger).child({ component: 'hot-swap-engine' });
  }

  /**
   * Start serving `component` in a fresh active instance. An id whose
   * previous instance was retired gets a new instance; a live id throws
   * SWAP.ALREADY_REGISTERED.
   */
  register(component: Component, options: { traceId?: string } = {}): SlotSnapshot {
    const existing = this.slots.get(component.id);
    if (existing && existing.active.state !== SwapState.Retired) {
      throw new CompatError(alreadyRegisteredError(component.id));
    }

    const trace = new TraceContext(options.traceId);
    const instance = new ComponentInstance(component);
    const slot: Slot = {
      componentId: component.id,
      active: instance,
      history: existing ? [...existing.history] : [],
      swapInProgress: false,
    };
    if (existing) this.archive(slot, existing.active);
    this.slots.set(component.id, slot);

    this.emitter.emit(
      trace.event({
        kind: 'instance.registered',
        componentIds: [component.id],
        transition: `none->${SwapState.Active}`,
        detail: {
          instanceId: instance.instanceId,
          version: formatVersion(component.version),
          rangeState: component.rangeState,
        },
      }),
    );
    this.log.info('Component instance registered', {
      componentId: component.id,
      version: formatVersion(component.version),
      rangeState: component.rangeState,
    });

    return toSnapshot(slot);
  }

  async requestSwap(
    componentId: string,
    candidate: Component,
    activate: ActivationHook,
    options: SwapRequestOptions = {},
  ): Promise<SwapOutcome> {
    const startedAt = Date.now();
    const trace = new TraceContext(options.traceId);
    const transitions: SwapTransitionRecord[] = [];
    const toVersion = formatVersion(candidate.version);
    const slot = this.slots.get(componentId);
    const fromVersion = slot ? formatVersion(slot.active.component.version) : undefined;

    const settle = (
      kind: 'swap.completed' | 'swap.rejected' | 'swap.failed',
      error?: TypedError,
      decision?: MatrixDecision,
    ): SwapOutcome => {
      const overrideApplied = decision === MatrixDecision.AllowWithOverride;
      const outcome: SwapOutcome = {
        success: kind === 'swap.completed',
        componentId,
        traceId: trace.traceId,
        fromVersion,
        toVersion,
        servingVersion: slot ? formatVersion(slot.active.component.version) : undefined,
        decision,
        overrideApplied,
        transitions,
        durationMs: Date.now() - startedAt,
        error: error ? { ...error, traceId: trace.traceId } : undefined,
      };

      let severity = 1;
      if (kind === 'swap.failed') severity = 4;
      else if (kind === 'swap.rejected') severity = error ? REJECTION_SEVERITY[error.code] ?? 3 : 3;
      else if (overrideApplied) severity = 3;

      this.emitter.emit(
        trace.event({
          kind,
          componentIds: [componentId],
          verdict: decision,
          severity,
          detail: {
            fromVersion,
            toVersion,
            servingVersion: outcome.servingVersion,
            overrideApplied,
            errorCode: error?.code,
            reason: error?.message,
            durationMs: outcome.durationMs,
          },
        }),
      );
      const logContext = { componentId, traceId: trace.traceId, toVersion, errorCode: error?.code };
      if (kind === 'swap.completed') this.log.info('Hot swap completed', logContext);
      else this.log.warn(kind === 'swap.failed' ? 'Hot swap rolled back' : 'Hot swap rejected', logContext);
      return outcome;
    };

    if (!slot) {
      return settle('swap.rejected', swapNotFoundError(componentId));
    }
    if (slot.active.state === SwapState.Retired) {
      return settle('swap.rejected', swapRetiredError(componentId));
    }
    if (slot.swapInProgress) {
      return settle('swap.rejected', swapInProgressError(componentId));
    }

    const old = slot.active;
    if (candidate.id !== componentId) {
      return settle(
        'swap.rejected',
        swapNotApplicableError(componentId, `candidate id "${candidate.id}" does not match`),
      );
    }
    if (old.component.hotSwapEnabled === false || candidate.hotSwapEnabled === false) {
      return settle('swap.rejected', swapNotApplicableError(componentId, 'hot swap disabled'));
    }

    slot.swapInProgress = true;
    try {
      transitions.push(this.move(trace, old, SwapState.Draining));

      const drainTimeoutMs = options.drainTimeoutMs ?? this.drainTimeoutMs;
      const quiescent = await old.waitForQuiescence(drainTimeoutMs);
      if (!quiescent) {
        const inFlight = old.inFlightCount;
        transitions.push(this.move(trace, old, SwapState.Active));
        return settle('swap.rejected', drainTimeoutError(componentId, drainTimeoutMs, inFlight));
      }

      const decision = resolveDecision(candidate.rangeState, old.component.rangeState, {
        allowExperimentalOverride: this.allowExperimentalOverride,
        strictMode: this.strictMode,
      });
      if (decision === MatrixDecision.Deny) {
        transitions.push(this.move(trace, old, SwapState.Active));
        return settle(
          'swap.rejected',
          policyRejectedError(componentId, old.component.rangeState, candidate.rangeState),
          decision,
        );
      }

      transitions.push(this.move(trace, old, SwapState.Swapping));

      try {
        await activate(candidate);
      } catch (err) {
        const failed = new ComponentInstance(candidate, SwapState.Failed);
        this.archive(slot, failed);
        transitions.push(this.record(trace, failed, null, SwapState.Failed));
        transitions.push(this.move(trace, old, SwapState.Active));
        return settle('swap.failed', activationFailedError(componentId, errorMessage(err)), decision);
      }

      const next = new ComponentInstance(candidate);
      slot.active = next;
      transitions.push(this.record(trace, next, null, SwapState.Active));
      transitions.push(this.move(trace, old, SwapState.Retired));
      this.archive(slot, old);
      return settle('swap.completed', undefined, decision);
    } finally {
      slot.swapInProgress = false;
    }
  }

  /**
   * Decommission a component: the serving instance and any failed
   * candidates in its history move to retired.
   */
  retire(componentId: string, options: { traceId?: string } = {}): RetireOutcome {
    const trace = new TraceContext(options.traceId);
    const slot = this.slots.get(componentId);

    let error: TypedError | undefined;
    if (!slot) error = swapNotFoundError(componentId);
    else if (slot.swapInProgress) error = swapInProgressError(componentId);
    else if (slot.active.state === SwapState.Retired) error = swapRetiredError(componentId);

    const retiredInstanceIds: string[] = [];
    if (slot && !error) {
      for (const instance of [...slot.history, slot.active]) {
        if (instance.state === SwapState.Failed || instance.state === SwapState.Active) {
          this.move(trace, instance, SwapState.Retired);
          retiredInstanceIds.push(instance.instanceId);
        }
      }
    }

    this.emitter.emit(
      trace.event({
        kind: 'instance.retired',
        componentIds: [componentId],
        severity: error ? 2 : 1,
        detail: { retiredInstanceIds, errorCode: error?.code },
      }),
    );
    if (!error) this.log.info('Component retired', { componentId, retiredCount: retiredInstanceIds.length });

    return {
      success: !error,
      componentId,
      traceId: trace.traceId,
      retiredInstanceIds,
      error: error ? { ...error, traceId: trace.traceId } : undefined,
    };
  }

  /** Run work on the serving instance of `componentId`. */
  async runWork<T>(componentId: string, work: (component: Component) => Promise<T> | T): Promise<T> {
    const slot = this.slots.get(componentId);
    if (!slot) {
      throw new CompatError(swapNotFoundError(componentId));
    }
    return slot.active.runWork(work);
  }

  getSlot(componentId: string): SlotSnapshot | undefined {
    const slot = this.slots.get(componentId);
    return slot ? toSnapshot(slot) : undefined;
  }

  listSlots(): SlotSnapshot[] {
    return [...this.slots.keys()].sort().map((id) => toSnapshot(this.requireSlot(id)));
  }

  /** Component ids with a swap currently draining or swapping. */
  swapsInFlight(): string[] {
    return [...this.slots.values()]
      .filter((slot) => isSwapInFlight(slot.active.state))
      .map((slot) => slot.componentId)
      .sort();
  }

  /** Append to the slot's history, dropping the oldest entries past the limit. */
  private archive(slot: Slot, instance: ComponentInstance): void {
    slot.history.push(instance);
    const excess = slot.history.length - this.historyLimit;
    if (excess > 0) slot.history.splice(0, excess);
  }

  private requireSlot(componentId: string): Slot {
    const slot = this.slots.get(componentId);
    if (!slot) throw new CompatError(swapNotFoundError(componentId));
    return slot;
  }

  private move(trace: TraceContext, instance: ComponentInstance, target: SwapState): SwapTransitionRecord {
    const record = instance.transition(target);
    this.emitTransition(trace, instance, record);
    return record;
  }

  private record(
    trace: TraceContext,
    instance: ComponentInstance,
    from: SwapState | null,
    to: SwapState,
  ): SwapTransitionRecord {
    const record: SwapTransitionRecord = { instanceId: instance.instanceId, from, to, at: new Date().toISOString() };
    this.emitTransition(trace, instance, record);
    return record;
  }

  private emitTransition(trace: TraceContext, instance: ComponentInstance, record: SwapTransitionRecord): void {
    this.emitter.emit(
      trace.event({
        kind: 'swap.transition',
        componentIds: [instance.component.id],
        transition: `${record.from ?? 'none'}->${record.to}`,
        detail: {
          instanceId: instance.instanceId,
          version: formatVersion(instance.component.version),
          rangeState: instance.component.rangeState,
        },
      }),
    );
  }
}

function toSnapshot(slot: Slot): SlotSnapshot {
  return {
    componentId: slot.componentId,
    active: slot.active.snapshot(),
    history: slot.history.map((instance) => instance.snapshot()),
    swapInProgress: slot.swapInProgress,
  };
}
