/**
 * JSON export of a telemetry trail, for offline audit and migration
 * planning.
 */

import { TELEMETRY_SCHEMA_VERSION, TelemetryEvent } from '../domain/telemetry';

export interface TelemetryExport {
  schemaVersion: string;
  exportedAt: string;
  count: number;
  /** Highest event severity in the export, 0 when empty. */
  maxSeverity: number;
  traces: string[];
  events: TelemetryEvent[];
}

export function buildTelemetryExport(events: readonly TelemetryEvent[], now: Date = new Date()): TelemetryExport {
  const traces: string[] = [];
  let maxSeverity = 0;
  for (const event of events) {
    if (!traces.includes(event.traceId)) traces.push(event.traceId);
    maxSeverity = Math.max(maxSeverity, event.severity);
  }
  return {
    schemaVersion: TELEMETRY_SCHEMA_VERSION,
    exportedAt: now.toISOString(),
    count: events.length,
    maxSeverity,
    traces,
    events: [...events],
  };
}

export function exportEventsJson(events: readonly TelemetryEvent[], now?: Date): string {
  return JSON.stringify(buildTelemetryExport(events, now), null, 2);
}
