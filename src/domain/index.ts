/**
 * Domain model exports.
 */

export * from './component';
export * from './errors';
export * from './swap';
export * from './telemetry';
export * from './verdict';
export * from './version';
