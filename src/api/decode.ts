/**
 * Request body decoding.
 *
 * Turns untrusted JSON into domain values. Shape problems throw
 * CompatError with VALIDATION.SCHEMA; malformed version text surfaces as
 * VERSION.PARSE from the parser.
 */

import { Component, DependencyEdge } from '../domain/component';
import { CompatError, validationError } from '../domain/errors';
import { RANGE_STATES, RangeState, isRangeState } from '../domain/version';
import { parseVersion } from '../semver/parser';

export interface GraphRequest {
  components: Component[];
  edges: DependencyEdge[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(message: string, path: string): never {
  throw new CompatError(validationError(message, { path }));
}

function requireString(record: Record<string, unknown>, field: string, path: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    fail(`${path}.${field} must be a non-empty string`, `${path}.${field}`);
  }
  return value;
}

function decodeRangeState(value: unknown, path: string): RangeState {
  if (!isRangeState(value)) {
    fail(`${path} must be one of ${RANGE_STATES.join(', ')}`, path);
  }
  return value;
}

export function decodeComponent(raw: unknown, path = 'component'): Component {
  if (!isRecord(raw)) fail(`${path} must be an object`, path);

  const hotSwapEnabled = raw.hotSwapEnabled;
  if (hotSwapEnabled !== undefined && typeof hotSwapEnabled !== 'boolean') {
    fail(`${path}.hotSwapEnabled must be a boolean`, `${path}.hotSwapEnabled`);
  }

  const component: Component = {
    id: requireString(raw, 'id', path),
    version: parseVersion(requireString(raw, 'version', path)),
    rangeState: decodeRangeState(raw.rangeState, `${path}.rangeState`),
  };
  return hotSwapEnabled === undefined ? component : { ...component, hotSwapEnabled };
}

export function decodeEdge(raw: unknown, path = 'edge'): DependencyEdge {
  if (!isRecord(raw)) fail(`${path} must be an object`, path);

  const required = raw.requiredRangeStates ?? [];
  if (!Array.isArray(required)) {
    fail(`${path}.requiredRangeStates must be an array`, `${path}.requiredRangeStates`);
  }

  return {
    consumerId: requireString(raw, 'consumerId', path),
    producerId: requireString(raw, 'producerId', path),
    versionConstraint: requireString(raw, 'versionConstraint', path),
    requiredRangeStates: required.map((state: unknown, i: number) =>
      decodeRangeState(state, `${path}.requiredRangeStates[${i}]`),
    ),
  };
}

export function decodeGraphRequest(body: unknown): GraphRequest {
  if (!isRecord(body)) fail('Request body must be an object', 'body');
  const { components, edges } = body;
  if (!Array.isArray(components)) fail('components must be an array', 'components');
  if (!Array.isArray(edges)) fail('edges must be an array', 'edges');
  return {
    components: components.map((c: unknown, i: number) => decodeComponent(c, `components[${i}]`)),
    edges: edges.map((e: unknown, i: number) => decodeEdge(e, `edges[${i}]`)),
  };
}

/** Optional non-negative integer field, e.g. a per-request drain timeout. */
export function decodeOptionalNonNegativeInt(record: unknown, field: string): number | undefined {
  if (!isRecord(record)) return undefined;
  const value = record[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    fail(`${field} must be a non-negative integer`, field);
  }
  return value;
}

export function requireRecord(body: unknown, path = 'body'): Record<string, unknown> {
  if (!isRecord(body)) fail('Request body must be an object', path);
  return body;
}
