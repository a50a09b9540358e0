/**
 * Trace context.
 *
 * One TraceContext per validation call or swap attempt. It stamps every
 * event it builds with the shared trace id and the next sequence number,
 * so an audit consumer can rebuild the decision order.
 */

import { v4 as uuid } from 'uuid';
import { TELEMETRY_SCHEMA_VERSION, TelemetryEvent, TelemetryEventKind } from '../domain/telemetry';

export interface TelemetryEventInput {
  kind: TelemetryEventKind;
  componentIds: string[];
  verdict?: string;
  transition?: string;
  /** Defaults to 1. */
  severity?: number;
  detail?: Record<string, unknown>;
}

export function newTraceId(): string {
  return `trc_${uuid()}`;
}

export class TraceContext {
  private sequence = 0;

  constructor(readonly traceId: string = newTraceId()) {}

  /** Build the next event of this trace. The result is frozen. */
  event(input: TelemetryEventInput): TelemetryEvent {
    this.sequence += 1;
    return Object.freeze({
      id: `evt_${uuid()}`,
      schemaVersion: TELEMETRY_SCHEMA_VERSION,
      traceId: this.traceId,
      sequence: this.sequence,
      timestamp: new Date().toISOString(),
      kind: input.kind,
      componentIds: Object.freeze([...input.componentIds]),
      verdict: input.verdict,
      transition: input.transition,
      severity: input.severity ?? 1,
      detail: Object.freeze({ ...input.detail }),
    });
  }

  get eventCount(): number {
    return this.sequence;
  }
}
