/**
 * SQLite Database Adapter
 *
 * Implementation of DatabaseAdapter over better-sqlite3.
 * Provides:
 * - Typed query methods
 * - Transactions (BEGIN IMMEDIATE / COMMIT / ROLLBACK)
 * - Retry with exponential backoff on SQLITE_BUSY / SQLITE_LOCKED
 * - Health check functionality
 *
 * better-sqlite3 is synchronous: every call completes before the returned
 * promise settles, so an aborted signal can only stop a call before it starts.
 * Transactions on one adapter are serialized; plain queries issued while a
 * transaction is open run inside it.
 */

import Database from 'better-sqlite3';
import type {
  DatabaseAdapter,
  ExecuteResult,
  TransactionContext,
  HealthStatus,
  QueryOptions,
} from '../adapter';
import { DEFAULT_PARTITION } from '../../constants';
import { retryDbOperation, type RetryConfig } from '../../utils/db-retry';
import { StoreError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const log = createLogger().module('SQLITE-ADAPTER');

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

export interface SqliteAdapterConfig {
  db: Database.Database;
  /** Partition identifier for logging/monitoring */
  partition?: string;
  retryConfig?: RetryConfig;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Whether an error is a transient lock error worth retrying
 */
export function isSqliteBusyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    TRANSIENT_SQLITE_CODES.has(error.code)
  );
}

export class SqliteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;
  private readonly partition: string;
  private readonly retryConfig: RetryConfig;
  private readonly debug: boolean;
  private transactionTail: Promise<void> = Promise.resolve();

  constructor(config: SqliteAdapterConfig) {
    this.db = config.db;
    this.partition = config.partition ?? DEFAULT_PARTITION;
    this.retryConfig = { ...config.retryConfig, isRetryable: isSqliteBusyError };
    this.debug = config.debug ?? false;
  }

  async query<T>(sql: string, params: unknown[] = [], options?: QueryOptions): Promise<T[]> {
    options?.signal?.throwIfAborted();
    const startTime = Date.now();

    const rows = await this.withRetry('query', sql, () =>
      this.db.prepare<unknown[], T>(sql).all(...params)
    );

    if (this.debug) {
      log.debug('SqliteAdapter.query completed', {
        partition: this.partition,
        durationMs: Date.now() - startTime,
        rowCount: rows.length,
      });
    }

    return rows;
  }

  async execute(sql: string, params: unknown[] = [], options?: QueryOptions): Promise<ExecuteResult> {
    options?.signal?.throwIfAborted();
    const startTime = Date.now();

    const result = await this.withRetry('execute', sql, () => this.db.prepare(sql).run(...params));
    const executeResult = this.toExecuteResult(result, startTime);

    if (this.debug) {
      log.debug('SqliteAdapter.execute completed', {
        partition: this.partition,
        durationMs: executeResult.durationMs,
        rowsAffected: executeResult.rowsAffected,
      });
    }

    return executeResult;
  }

  /**
   * Execute `fn` inside BEGIN IMMEDIATE ... COMMIT.
   *
   * Statements issued through `tx` are not retried individually: the write
   * lock is already held once BEGIN IMMEDIATE succeeds.
   */
  transaction<T>(fn: (tx: TransactionContext) => Promise<T>, options?: QueryOptions): Promise<T> {
    const run = this.transactionTail.then(() => this.runTransaction(fn, options));
    this.transactionTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async isHealthy(): Promise<HealthStatus> {
    const startTime = Date.now();

    try {
      const row = this.db.prepare<unknown[], { ok: number }>('SELECT 1 AS ok').get();
      return {
        healthy: row?.ok === 1,
        latencyMs: Date.now() - startTime,
        type: this.getType(),
        partition: this.partition,
      };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
        type: this.getType(),
        partition: this.partition,
      };
    }
  }

  getType(): string {
    return 'sqlite';
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private async runTransaction<T>(
    fn: (tx: TransactionContext) => Promise<T>,
    options?: QueryOptions
  ): Promise<T> {
    options?.signal?.throwIfAborted();
    const startTime = Date.now();

    await this.withRetry('transaction', 'BEGIN IMMEDIATE', () => this.db.exec('BEGIN IMMEDIATE'));

    const tx: TransactionContext = {
      query: async <R>(sql: string, params: unknown[] = []): Promise<R[]> =>
        this.db.prepare<unknown[], R>(sql).all(...params),
      execute: async (sql: string, params: unknown[] = []): Promise<ExecuteResult> =>
        this.toExecuteResult(this.db.prepare(sql).run(...params), Date.now()),
    };

    try {
      const result = await fn(tx);
      // A commit must not be started once the caller has given up
      options?.signal?.throwIfAborted();
      this.db.exec('COMMIT');

      if (this.debug) {
        log.debug('SqliteAdapter.transaction completed', {
          partition: this.partition,
          durationMs: Date.now() - startTime,
        });
      }

      return result;
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
      log.error('SqliteAdapter.transaction rolled back', {
        partition: this.partition,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async withRetry<T>(operation: string, sql: string, fn: () => T): Promise<T> {
    try {
      const result = await retryDbOperation(
        async () => ({ value: fn() }),
        `SqliteAdapter.${operation}[${this.partition}]`,
        this.retryConfig
      );

      if (!result) {
        throw new StoreError(`SqliteAdapter.${operation} failed after retries exhausted`);
      }

      return result.value;
    } catch (error) {
      log.error(`SqliteAdapter.${operation} error`, {
        partition: this.partition,
        sql: this.truncateSql(sql),
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private toExecuteResult(result: Database.RunResult, startTime: number): ExecuteResult {
    return {
      rowsAffected: result.changes,
      lastInsertRowid: result.lastInsertRowid,
      success: true,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Truncate SQL for logging (avoid logging bound values or huge IN lists)
   */
  private truncateSql(sql: string, maxLength: number = 100): string {
    if (sql.length <= maxLength) {
      return sql;
    }
    return sql.substring(0, maxLength) + '...';
  }
}

/**
 * Open a SQLite database file (or `:memory:`) and wrap it in an adapter
 *
 * @example
 * ```typescript
 * const adapter = createSqliteAdapter(process.env.OPERATIONAL_DB_PATH ?? 'operational.db', 'core');
 * ```
 */
export function createSqliteAdapter(
  filename: string,
  partition: string = DEFAULT_PARTITION,
  options?: { retryConfig?: RetryConfig; debug?: boolean }
): SqliteAdapter {
  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return new SqliteAdapter({
    db,
    partition,
    retryConfig: options?.retryConfig,
    debug: options?.debug,
  });
}
