export * from './constraint';
export * from './parser';
