// Re-export everything from shared modules
export * from './constants';
export * from './db';

// Utilities
export * from './utils/logger';
export * from './utils/errors';
export { retryDbOperation, computeBackoffDelay, type RetryConfig } from './utils/db-retry';
