export * from './hot-swap-engine';
export * from './instance';
export * from './state-machine';
