/**
 * SemVerX compatibility gate.
 *
 * Public exports for programmatic use. The HTTP server lives in main.ts.
 */

export { createApp } from './server';
export { createCompatContext } from './context';
export type { CompatContext, CompatContextOptions, CompatStatus } from './context';
export * from './config';
export * from './logger';
export * from './domain';
export * from './semver';
export * from './compat';
export * from './registry';
export * from './validator';
export * from './engine';
export * from './telemetry';
