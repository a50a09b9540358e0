/**
 * In-process telemetry sinks.
 */

import { TelemetryEvent, TelemetryEventKind, TelemetrySink } from '../domain/telemetry';
import { Logger, logger as rootLogger } from '../logger';

export interface TelemetryQuery {
  traceId?: string;
  componentId?: string;
  kinds?: TelemetryEventKind[];
  limit?: number;
  offset?: number;
}

/**
 * Append-only in-memory sink, indexed by trace id.
 *
 * Used by the HTTP surface for audit queries and by tests.
 */
export class MemoryTelemetrySink implements TelemetrySink {
  private events: TelemetryEvent[] = [];
  private traceIndex = new Map<string, number[]>();

  async deliver(event: TelemetryEvent): Promise<void> {
    const idx = this.events.length;
    this.events.push(event);
    const indices = this.traceIndex.get(event.traceId) ?? [];
    indices.push(idx);
    this.traceIndex.set(event.traceId, indices);
  }

  /** Events of one trace, in sequence order. */
  byTrace(traceId: string): TelemetryEvent[] {
    const indices = this.traceIndex.get(traceId) ?? [];
    return indices.map((i) => this.events[i]).sort((a, b) => a.sequence - b.sequence);
  }

  query(query: TelemetryQuery = {}): TelemetryEvent[] {
    let items = query.traceId ? this.byTrace(query.traceId) : [...this.events];
    if (query.componentId) {
      const componentId = query.componentId;
      items = items.filter((e) => e.componentIds.includes(componentId));
    }
    if (query.kinds?.length) {
      const kinds = query.kinds;
      items = items.filter((e) => kinds.includes(e.kind));
    }
    const offset = query.offset ?? 0;
    const limit = query.limit ?? items.length;
    return items.slice(offset, offset + limit);
  }

  all(): TelemetryEvent[] {
    return [...this.events];
  }

  get size(): number {
    return this.events.length;
  }
}

/** Writes each event as a structured log line; severity 4+ logs as an error. */
export class LoggerTelemetrySink implements TelemetrySink {
  private readonly log: Logger;

  constructor(logger: Logger = rootLogger) {
    this.log = logger.child({ component: 'telemetry-sink' });
  }

  async deliver(event: TelemetryEvent): Promise<void> {
    const context = {
      eventId: event.id,
      traceId: event.traceId,
      sequence: event.sequence,
      kind: event.kind,
      componentIds: event.componentIds,
      verdict: event.verdict,
      transition: event.transition,
      severity: event.severity,
      ...event.detail,
    };
    if (event.severity >= 4) {
      this.log.error(`Decision event ${event.kind}`, context);
    } else {
      this.log.info(`Decision event ${event.kind}`, context);
    }
  }
}

/** Delivers every event to each of several sinks; the first failure is rethrown after all have run. */
export class FanOutTelemetrySink implements TelemetrySink {
  constructor(private readonly sinks: TelemetrySink[]) {}

  async deliver(event: TelemetryEvent): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.deliver(event)));
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failure) throw failure.reason;
  }
}
