export * from './emitter';
export * from './export';
export * from './sinks';
export * from './trace';
export * from './webhook-sink';
