/**
 * Core configuration.
 *
 * Options the CLI/config layer hands to the core at construction:
 *
 *   const config = createCompatConfig({ drainTimeoutMs: 500 });
 *   const result = validateCompatConfig(config);
 *   if (!result.valid) console.error(result.errors);
 *
 * loadCompatConfigFromEnv() reads the same fields from SEMVERX_* variables.
 */

export interface CompatConfig {
  /** Longest time a swap waits for in-flight work to finish. */
  drainTimeoutMs: number;
  /** Bound of the pending telemetry queue. */
  telemetryQueueCapacity: number;
  /** Relax relaxable deny cells of the matrix without a per-edge opt-in. */
  allowExperimentalOverride: boolean;
  /** Deny every swap that changes range state. */
  strictMode: boolean;
  /** Instances each slot keeps after they leave service; older ones are dropped. */
  slotHistoryLimit: number;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const DEFAULT_COMPAT_CONFIG: Readonly<CompatConfig> = Object.freeze({
  drainTimeoutMs: 5000,
  telemetryQueueCapacity: 1000,
  allowExperimentalOverride: false,
  strictMode: false,
  slotHistoryLimit: 20,
});

const MAX_DRAIN_TIMEOUT_MS = 10 * 60 * 1000;

export function createCompatConfig(overrides?: Partial<CompatConfig>): CompatConfig {
  return { ...DEFAULT_COMPAT_CONFIG, ...overrides };
}

export function validateCompatConfig(config: CompatConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isFinite(config.drainTimeoutMs) || config.drainTimeoutMs < 0) {
    errors.push('drainTimeoutMs must be a non-negative number');
  } else if (config.drainTimeoutMs > MAX_DRAIN_TIMEOUT_MS) {
    errors.push(`drainTimeoutMs must not exceed ${MAX_DRAIN_TIMEOUT_MS}`);
  } else if (config.drainTimeoutMs === 0) {
    warnings.push('drainTimeoutMs is 0; swaps only proceed when the instance is already idle');
  }

  if (!Number.isInteger(config.telemetryQueueCapacity) || config.telemetryQueueCapacity < 1) {
    errors.push('telemetryQueueCapacity must be a positive integer');
  } else if (config.telemetryQueueCapacity < 16) {
    warnings.push('telemetryQueueCapacity below 16 drops events under moderate load');
  }

  if (!Number.isInteger(config.slotHistoryLimit) || config.slotHistoryLimit < 0) {
    errors.push('slotHistoryLimit must be a non-negative integer');
  }

  if (config.strictMode && config.allowExperimentalOverride) {
    warnings.push('strictMode denies cross-state swaps before allowExperimentalOverride is considered');
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Read overrides from SEMVERX_* environment variables. Unset variables keep defaults. */
export function loadCompatConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CompatConfig {
  const overrides: Partial<CompatConfig> = {};

  const drain = env.SEMVERX_DRAIN_TIMEOUT_MS;
  if (drain !== undefined && drain !== '') overrides.drainTimeoutMs = Number(drain);

  const capacity = env.SEMVERX_TELEMETRY_QUEUE_CAPACITY;
  if (capacity !== undefined && capacity !== '') overrides.telemetryQueueCapacity = Number(capacity);

  const historyLimit = env.SEMVERX_SLOT_HISTORY_LIMIT;
  if (historyLimit !== undefined && historyLimit !== '') overrides.slotHistoryLimit = Number(historyLimit);

  const override = parseBoolean(env.SEMVERX_ALLOW_EXPERIMENTAL_OVERRIDE);
  if (override !== undefined) overrides.allowExperimentalOverride = override;

  const strict = parseBoolean(env.SEMVERX_STRICT_MODE);
  if (strict !== undefined) overrides.strictMode = strict;

  return createCompatConfig(overrides);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      return undefined;
  }
}
