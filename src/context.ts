/**
 * Composition root.
 *
 * Builds one self-contained set of core services from a configuration.
 * There is no process-wide state: two contexts never share a queue, a
 * slot table or a counter.
 */

import { CompatConfig, createCompatConfig, validateCompatConfig } from './config';
import { CompatError, configError } from './domain/errors';
import { ActivationHook } from './domain/swap';
import { TelemetrySink, TelemetryStats } from './domain/telemetry';
import { HotSwapEngine } from './engine/hot-swap-engine';
import { Logger, logger as rootLogger } from './logger';
import { TelemetryEmitter } from './telemetry/emitter';
import { FanOutTelemetrySink, MemoryTelemetrySink } from './telemetry/sinks';
import { GraphValidator } from './validator/graph-validator';

export interface CompatContextOptions {
  /** Extra sinks that receive every event besides the in-memory audit trail. */
  sinks?: TelemetrySink[];
  /** Activation used by the HTTP swap route. Defaults to accepting every candidate. */
  activate?: ActivationHook;
  logger?: Logger;
}

export interface CompatStatus {
  telemetry: TelemetryStats;
  eventsRecorded: number;
  registeredComponents: number;
  swapsInFlight: string[];
  config: CompatConfig;
}

export interface CompatContext {
  config: CompatConfig;
  /** Audit trail of every delivered event. */
  auditSink: MemoryTelemetrySink;
  emitter: TelemetryEmitter;
  validator: GraphValidator;
  engine: HotSwapEngine;
  activate: ActivationHook;
  logger: Logger;
  getStatus(): CompatStatus;
  /** Deliver pending telemetry and stop accepting events. */
  shutdown(): Promise<void>;
}

/** Throws CONFIG.INVALID when the configuration does not validate. */
export function createCompatContext(
  overrides?: Partial<CompatConfig>,
  options: CompatContextOptions = {},
): CompatContext {
  const config = createCompatConfig(overrides);
  const log = options.logger ?? rootLogger;

  const validation = validateCompatConfig(config);
  if (!validation.valid) {
    throw new CompatError(configError(validation.errors));
  }
  for (const warning of validation.warnings) {
    log.warn('Configuration warning', { warning });
  }

  const auditSink = new MemoryTelemetrySink();
  const extraSinks = options.sinks ?? [];
  const sink = extraSinks.length > 0 ? new FanOutTelemetrySink([auditSink, ...extraSinks]) : auditSink;
  const emitter = new TelemetryEmitter({ sink, capacity: config.telemetryQueueCapacity, logger: log });

  const validator = new GraphValidator({
    emitter,
    allowExperimentalOverride: config.allowExperimentalOverride,
    logger: log,
  });
  const engine = new HotSwapEngine({
    emitter,
    drainTimeoutMs: config.drainTimeoutMs,
    allowExperimentalOverride: config.allowExperimentalOverride,
    strictMode: config.strictMode,
    historyLimit: config.slotHistoryLimit,
    logger: log,
  });

  return {
    config,
    auditSink,
    emitter,
    validator,
    engine,
    activate: options.activate ?? (() => undefined),
    logger: log,
    getStatus: () => ({
      telemetry: emitter.getStats(),
      eventsRecorded: auditSink.size,
      registeredComponents: engine.listSlots().length,
      swapsInFlight: engine.swapsInFlight(),
      config,
    }),
    shutdown: () => emitter.close(),
  };
}
