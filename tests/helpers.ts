import { Component, DependencyEdge } from '../src/domain/component';
import { RangeState } from '../src/domain/version';
import { LogEntry, setLogHandler } from '../src/logger';
import { parseVersion } from '../src/semver/parser';
import { TelemetryEmitter } from '../src/telemetry/emitter';
import { MemoryTelemetrySink } from '../src/telemetry/sinks';

export function component(
  id: string,
  version: string,
  rangeState: RangeState = RangeState.Stable,
  hotSwapEnabled?: boolean,
): Component {
  const base = { id, version: parseVersion(version), rangeState };
  return hotSwapEnabled === undefined ? base : { ...base, hotSwapEnabled };
}

export function edge(
  consumerId: string,
  producerId: string,
  versionConstraint = '*',
  requiredRangeStates: RangeState[] = [],
): DependencyEdge {
  return { consumerId, producerId, versionConstraint, requiredRangeStates };
}

/** Emitter writing into a fresh in-memory sink. */
export function createTestTelemetry(capacity = 1000): { emitter: TelemetryEmitter; sink: MemoryTelemetrySink } {
  const sink = new MemoryTelemetrySink();
  return { sink, emitter: new TelemetryEmitter({ sink, capacity }) };
}

/** Route log output into an array for the duration of a test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  beforeEach(() => {
    entries.length = 0;
    setLogHandler((entry) => entries.push(entry));
  });
  afterEach(() => setLogHandler());
  return entries;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
