/**
 * Telemetry emitter.
 *
 * emit() never blocks and never throws: it appends to a bounded queue and
 * returns. A background drain, scheduled with setImmediate, hands events
 * to the sink one at a time. When the queue is full the oldest pending
 * event is discarded and the drop counter grows by one.
 */

import { TelemetryEvent, TelemetrySink, TelemetryStats } from '../domain/telemetry';
import { Logger, errorMessage, logger as rootLogger } from '../logger';

export interface TelemetryEmitterOptions {
  sink: TelemetrySink;
  /** Maximum number of events waiting for delivery. */
  capacity: number;
  logger?: Logger;
}

export class TelemetryEmitter {
  private readonly sink: TelemetrySink;
  private readonly capacity: number;
  private readonly log: Logger;
  private queue: TelemetryEvent[] = [];
  private delivered = 0;
  private dropped = 0;
  private failed = 0;
  private draining = false;
  private scheduled = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: TelemetryEmitterOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Telemetry queue capacity must be a positive integer, got ${options.capacity}`);
    }
    this.sink = options.sink;
    this.capacity = options.capacity;
    this.log = (options.logger ?? rootLogger).child({ component: 'telemetry' });
  }

  emit(event: TelemetryEvent): void {
    if (this.closed) {
      this.dropped += 1;
      return;
    }
    if (this.queue.length >= this.capacity) {
      const lost = this.queue.shift();
      this.dropped += 1;
      this.log.debug('Telemetry queue full, dropped oldest event', {
        droppedEventId: lost?.id,
        droppedTotal: this.dropped,
      });
    }
    this.queue.push(event);
    this.scheduleDrain();
  }

  /** Resolves once every queued event has been handed to the sink. */
  flush(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting events and deliver what is already queued. */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  getStats(): TelemetryStats {
    return {
      queued: this.queue.length,
      capacity: this.capacity,
      delivered: this.delivered,
      dropped: this.dropped,
      failed: this.failed,
    };
  }

  get droppedCount(): number {
    return this.dropped;
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && !this.draining && !this.scheduled;
  }

  private scheduleDrain(): void {
    if (this.draining || this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.drain().catch((err) => {
        this.log.error('Telemetry drain aborted', { error: errorMessage(err) });
      });
    });
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        try {
          await this.sink.deliver(next);
          this.delivered += 1;
        } catch (err) {
          this.failed += 1;
          this.log.warn('Telemetry delivery failed', {
            eventId: next.id,
            traceId: next.traceId,
            error: errorMessage(err),
          });
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
