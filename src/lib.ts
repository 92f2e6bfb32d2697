/**
 * runkeep library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type RunStoreConfig } from './config/index.js';

// Facade
export { createRunStore, type RunStore, type RunStoreHooks } from './run-store.js';

// Components
export * from './artifacts/index.js';
export * from './transcript/index.js';
export * from './lifecycle/index.js';

// Utilities
export { createLogger } from './utils/logger.js';
export { KeyedMutex } from './utils/keyed-mutex.js';
