export * from './graph-validator';
