export * from './run.js';
export * from './artifact.js';
export * from './lifecycle.js';
export * from './reports.js';
export * from './search.js';
