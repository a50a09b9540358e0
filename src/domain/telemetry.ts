/**
 * Telemetry event domain model.
 *
 * Events are append-only records of validation and swap decisions,
 * correlated by trace id and ordered within a trace by sequence number.
 */

export type TelemetryEventKind =
  | 'edge.evaluated'
  | 'graph.verdict'
  | 'validation.rejected'
  | 'swap.transition'
  | 'swap.completed'
  | 'swap.rejected'
  | 'swap.failed'
  | 'instance.registered'
  | 'instance.retired';

export const TELEMETRY_EVENT_KINDS: readonly TelemetryEventKind[] = [
  'edge.evaluated',
  'graph.verdict',
  'validation.rejected',
  'swap.transition',
  'swap.completed',
  'swap.rejected',
  'swap.failed',
  'instance.registered',
  'instance.retired',
];

/** Event schema version for downstream consumers. */
export const TELEMETRY_SCHEMA_VERSION = '1.0.0';

export interface TelemetryEvent {
  readonly id: string;
  readonly schemaVersion: string;
  readonly traceId: string;
  /** Position within the trace, starting at 1. */
  readonly sequence: number;
  readonly timestamp: string;
  readonly kind: TelemetryEventKind;
  readonly componentIds: readonly string[];
  /** Edge or graph outcome for validation events. */
  readonly verdict?: string;
  /** "from->to" for swap transitions. */
  readonly transition?: string;
  /** 1 (informational) to 5 (blocking). */
  readonly severity: number;
  readonly detail: Readonly<Record<string, unknown>>;
}

/** External consumer of telemetry events. */
export interface TelemetrySink {
  deliver(event: TelemetryEvent): Promise<void>;
}

export interface TelemetryStats {
  queued: number;
  capacity: number;
  delivered: number;
  dropped: number;
  failed: number;
}
