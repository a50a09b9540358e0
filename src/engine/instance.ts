/**
 * Live component instance.
 *
 * Tracks the lifecycle state and in-flight work of one instance. Work is
 * only admitted while the instance is active; waitForQuiescence() lets a
 * swap suspend until the in-flight count reaches zero or a timeout fires.
 */

import { v4 as uuid } from 'uuid';
import { Component } from '../domain/component';
import { CompatError, instanceUnavailableError } from '../domain/errors';
import { InstanceSnapshot, SwapState, SwapTransitionRecord } from '../domain/swap';
import { acceptsWork, transitionSwapState } from './state-machine';

export class ComponentInstance {
  readonly instanceId = `inst_${uuid()}`;
  readonly createdAt = new Date().toISOString();
  private currentState: SwapState;
  private inFlight = 0;
  private quiescenceWaiters: Array<() => void> = [];

  constructor(
    readonly component: Component,
    initialState: SwapState = SwapState.Active,
  ) {
    this.currentState = initialState;
  }

  get state(): SwapState {
    return this.currentState;
  }

  get inFlightCount(): number {
    return this.inFlight;
  }

  /**
   * Move to `target`. Throws CompatError on an illegal transition: the
   * engine only requests legal ones, so a failure here is a bug.
   */
  transition(target: SwapState): SwapTransitionRecord {
    const result = transitionSwapState(this.currentState, target);
    if (!result.success || result.newState === undefined) {
      throw new CompatError(
        result.error ?? instanceUnavailableError(this.component.id, this.currentState),
      );
    }
    const record: SwapTransitionRecord = {
      instanceId: this.instanceId,
      from: this.currentState,
      to: result.newState,
      at: new Date().toISOString(),
    };
    this.currentState = result.newState;
    return record;
  }

  /** Run one unit of work. Rejects with INSTANCE.UNAVAILABLE unless active. */
  async runWork<T>(work: (component: Component) => Promise<T> | T): Promise<T> {
    if (!acceptsWork(this.currentState)) {
      throw new CompatError(instanceUnavailableError(this.component.id, this.currentState));
    }
    this.inFlight += 1;
    try {
      return await work(this.component);
    } finally {
      this.inFlight -= 1;
      if (this.inFlight === 0) this.notifyQuiescent();
    }
  }

  /** Resolves true once no work is in flight, false if `timeoutMs` elapses first. */
  waitForQuiescence(timeoutMs: number): Promise<boolean> {
    if (this.inFlight === 0) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const onQuiescent = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.quiescenceWaiters = this.quiescenceWaiters.filter((w) => w !== onQuiescent);
        resolve(false);
      }, timeoutMs);
      this.quiescenceWaiters.push(onQuiescent);
    });
  }

  snapshot(): InstanceSnapshot {
    return {
      instanceId: this.instanceId,
      component: this.component,
      state: this.currentState,
      inFlight: this.inFlight,
      createdAt: this.createdAt,
    };
  }

  private notifyQuiescent(): void {
    const waiters = this.quiescenceWaiters;
    this.quiescenceWaiters = [];
    for (const waiter of waiters) waiter();
  }
}
