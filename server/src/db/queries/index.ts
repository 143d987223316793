export * from './shipments.js';
export * from './syncRuns.js';
