/**
 * Typed error model.
 *
 * Decision outcomes (verdicts, rejected swaps) are returned as values that
 * carry a TypedError; only malformed input and misuse of the API are
 * thrown, wrapped in CompatError so callers still get the typed payload.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VERSION'
  | 'CONSTRAINT'
  | 'DEPENDENCY'
  | 'SWAP'
  | 'INSTANCE'
  | 'CONFIG'
  | 'VALIDATION'
  | 'SYSTEM';

/** Machine-actionable remediation hint. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

export interface TypedError {
  /** Namespaced error code, e.g. "SWAP.DRAIN_TIMEOUT". */
  code: string;
  message: string;
  /** Component the error concerns, when there is one. */
  componentId?: string;
  /** Telemetry trace the error was raised under. */
  traceId?: string;
  /** Whether repeating the same request unchanged may succeed. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

export function createTypedError(params: {
  code: string;
  message: string;
  componentId?: string;
  traceId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    componentId: params.componentId,
    traceId: params.traceId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Exception carrier for the cases that must throw. */
export class CompatError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'CompatError';
  }
}

export function isCompatError(err: unknown): err is CompatError {
  return err instanceof CompatError;
}

// --- Input errors ---

export function versionParseError(text: string, reason: string): TypedError {
  return createTypedError({
    code: 'VERSION.PARSE',
    message: `Invalid version "${text}": ${reason}`,
    details: { input: text, reason },
    suggestedFixes: [
      { type: 'USE_FORMAT', params: { format: 'major.minor.patch[-prerelease]' } },
    ],
  });
}

export function constraintParseError(text: string, reason: string): TypedError {
  return createTypedError({
    code: 'CONSTRAINT.PARSE',
    message: `Invalid version constraint "${text}": ${reason}`,
    details: { input: text, reason },
    suggestedFixes: [
      {
        type: 'USE_FORMAT',
        params: { examples: ['1.2.3', '>=1.0.0 <2.0.0', '^1.2.0', '~1.2.0', '1.x', '*'] },
      },
    ],
  });
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
  });
}

export function configError(errors: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `Invalid configuration: ${errors.join('; ')}`,
    details: { errors },
  });
}

export function duplicateComponentError(componentId: string, version: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.DUPLICATE_COMPONENT',
    message: `Component ${componentId}@${version} is declared more than once`,
    componentId,
    details: { version },
  });
}

// --- Graph errors ---

export function unresolvedDependencyError(
  componentId: string,
  role: 'consumer' | 'producer',
  traceId?: string,
): TypedError {
  return createTypedError({
    code: 'DEPENDENCY.UNRESOLVED',
    message: `Unresolved ${role} component: ${componentId}`,
    componentId,
    traceId,
    details: { role },
    suggestedFixes: [
      { type: 'DECLARE_COMPONENT', params: { componentId }, description: `Add "${componentId}" to the component set` },
    ],
  });
}

// --- Hot-swap errors ---

export function swapNotFoundError(componentId: string, traceId?: string): TypedError {
  return createTypedError({
    code: 'SWAP.NOT_FOUND',
    message: `No live instance registered for component: ${componentId}`,
    componentId,
    traceId,
  });
}

export function swapRetiredError(componentId: string, traceId?: string): TypedError {
  return createTypedError({
    code: 'SWAP.RETIRED',
    message: `Component ${componentId} has been retired`,
    componentId,
    traceId,
    suggestedFixes: [
      { type: 'REGISTER_INSTANCE', params: { componentId }, description: 'Register a fresh instance before swapping' },
    ],
  });
}

export function alreadyRegisteredError(componentId: string): TypedError {
  return createTypedError({
    code: 'SWAP.ALREADY_REGISTERED',
    message: `Component ${componentId} already has a live instance`,
    componentId,
    suggestedFixes: [
      { type: 'REQUEST_SWAP', params: { componentId }, description: 'Swap the live instance instead of registering a second one' },
    ],
  });
}

export function swapInProgressError(componentId: string, traceId?: string): TypedError {
  return createTypedError({
    code: 'SWAP.IN_PROGRESS',
    message: `A swap is already in progress for component: ${componentId}`,
    componentId,
    traceId,
    retryable: true,
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: {} }],
  });
}

export function swapNotApplicableError(componentId: string, reason: string, traceId?: string): TypedError {
  return createTypedError({
    code: 'SWAP.NOT_APPLICABLE',
    message: `Hot swap not applicable for ${componentId}: ${reason}`,
    componentId,
    traceId,
    details: { reason },
  });
}

export function drainTimeoutError(
  componentId: string,
  timeoutMs: number,
  inFlight: number,
  traceId?: string,
): TypedError {
  return createTypedError({
    code: 'SWAP.DRAIN_TIMEOUT',
    message: `Instance of ${componentId} did not reach quiescence within ${timeoutMs}ms`,
    componentId,
    traceId,
    retryable: true,
    details: { timeoutMs, inFlight },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { drainTimeoutMs: timeoutMs * 2 } },
      { type: 'REDUCE_LOAD', params: {} },
    ],
  });
}

export function policyRejectedError(
  componentId: string,
  fromState: string,
  toState: string,
  traceId?: string,
): TypedError {
  return createTypedError({
    code: 'SWAP.POLICY_REJECTED',
    message: `Swap of ${componentId} from ${fromState} to ${toState} is denied by the compatibility matrix`,
    componentId,
    traceId,
    details: { fromState, toState },
    suggestedFixes: [
      { type: 'ENABLE_OVERRIDE', params: { allowExperimentalOverride: true } },
    ],
  });
}

export function activationFailedError(componentId: string, cause: string, traceId?: string): TypedError {
  return createTypedError({
    code: 'SWAP.ACTIVATION_FAILED',
    message: `Activation of new ${componentId} instance failed: ${cause}`,
    componentId,
    traceId,
    details: { cause },
  });
}

export function invalidSwapTransitionError(from: string, to: string, validTargets: readonly string[]): TypedError {
  return createTypedError({
    code: 'SWAP.INVALID_TRANSITION',
    message: `Invalid swap state transition: ${from} -> ${to}`,
    details: { from, to, validTargets: [...validTargets] },
  });
}

export function instanceUnavailableError(componentId: string, state: string): TypedError {
  return createTypedError({
    code: 'INSTANCE.UNAVAILABLE',
    message: `Instance of ${componentId} is not accepting work while ${state}`,
    componentId,
    retryable: true,
    details: { state },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: {} }],
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
