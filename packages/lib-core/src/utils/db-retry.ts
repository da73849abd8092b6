/**
 * Database Retry Utilities
 *
 * Exponential backoff for database operations that fail with transient
 * errors (a locked SQLite file, a busy connection).
 */

import { createLogger } from './logger';

const log = createLogger().module('DB-RETRY');

export interface RetryConfig {
  maxRetries?: number; // Maximum retry attempts (default: 3)
  initialDelayMs?: number; // Initial delay in milliseconds (default: 100)
  maxDelayMs?: number; // Maximum delay in milliseconds (default: 5000)
  backoffMultiplier?: number; // Backoff multiplier (default: 2)
  /** Only errors for which this returns true are retried (default: all) */
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  isRetryable: () => true,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the retry that follows `attempt` (0-indexed).
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig = {}): number {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  return Math.min(cfg.initialDelayMs * Math.pow(cfg.backoffMultiplier, attempt), cfg.maxDelayMs);
}

/**
 * Execute a database operation with exponential backoff retry logic.
 *
 * Errors rejected by `isRetryable` are rethrown immediately.
 *
 * @returns The operation result, or null when every attempt failed with a retryable error
 *
 * @example
 * const rows = await retryDbOperation(
 *   async () => db.prepare('SELECT * FROM persisted_grants').all(),
 *   'SqliteAdapter.query[core]',
 *   { isRetryable: isSqliteBusyError }
 * );
 */
export async function retryDbOperation<T>(
  operation: () => Promise<T>,
  operationName: string,
  config: RetryConfig = {}
): Promise<T | null> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= cfg.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!cfg.isRetryable(error)) {
        throw error;
      }
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === cfg.maxRetries) {
        break;
      }

      const delay = computeBackoffDelay(attempt, cfg);
      log.warn(`${operationName}: Attempt ${attempt + 1}/${cfg.maxRetries + 1} failed, retrying in ${delay}ms`, {
        error: lastError.message,
        attempt: attempt + 1,
        maxRetries: cfg.maxRetries + 1,
        nextDelay: delay,
      });

      await sleep(delay);
    }
  }

  log.error(`${operationName}: All ${cfg.maxRetries + 1} attempts failed`, {
    error: lastError?.message,
    operationName,
  });

  return null;
}
