/**
 * Database Adapter Interface
 *
 * Abstraction over the SQL database that holds operational data
 * (persisted grants, device flow codes). Enables:
 * - Multiple backend support (SQLite today, Postgres later)
 * - In-memory databases for tests
 *
 * Design decisions:
 * - Generic methods for typed rows
 * - Transaction support with context passing
 * - Health check for monitoring
 */

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecuteResult {
  /** Number of rows affected by the operation */
  rowsAffected: number;
  /** Last inserted row ID (if applicable) */
  lastInsertRowid?: number | bigint;
  success: boolean;
  /** Duration of the operation in milliseconds */
  durationMs?: number;
}

/**
 * Transaction context passed to transaction callbacks
 */
export interface TransactionContext {
  query<T>(sql: string, params?: unknown[]): Promise<T[]>;
  execute(sql: string, params?: unknown[]): Promise<ExecuteResult>;
}

export interface HealthStatus {
  healthy: boolean;
  latencyMs: number;
  /** Error message if unhealthy */
  error?: string;
  /** Database type (sqlite, postgres, etc.) */
  type: string;
  partition?: string;
}

/**
 * Per-call options
 */
export interface QueryOptions {
  /** Aborts the call before it reaches the database */
  signal?: AbortSignal;
}

/**
 * Database Adapter Interface
 *
 * All database implementations must implement this interface.
 */
export interface DatabaseAdapter {
  /**
   * Execute a SELECT query and return all results
   *
   * @param sql - SQL query string with ? placeholders
   * @param params - Query parameters (ordered)
   *
   * @example
   * ```typescript
   * const grants = await adapter.query<PersistedGrant>(
   *   'SELECT * FROM persisted_grants WHERE expiration < ? ORDER BY expiration ASC LIMIT ?',
   *   [Date.now(), 100]
   * );
   * ```
   */
  query<T>(sql: string, params?: unknown[], options?: QueryOptions): Promise<T[]>;

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   *
   * @returns Execution result with affected rows
   */
  execute(sql: string, params?: unknown[], options?: QueryOptions): Promise<ExecuteResult>;

  /**
   * Execute multiple statements in a transaction
   *
   * The transaction commits when `fn` resolves and rolls back when it rejects.
   *
   * @example
   * ```typescript
   * const removed = await adapter.transaction(async (tx) => {
   *   const result = await tx.execute('DELETE FROM device_flow_codes WHERE device_code = ?', [code]);
   *   return result.rowsAffected;
   * });
   * ```
   */
  transaction<T>(fn: (tx: TransactionContext) => Promise<T>, options?: QueryOptions): Promise<T>;

  /**
   * Check if the database is healthy and responsive
   */
  isHealthy(): Promise<HealthStatus>;

  /**
   * Get the database type identifier (e.g., 'sqlite', 'postgres')
   */
  getType(): string;

  /**
   * Close the database connection (if applicable)
   */
  close(): Promise<void>;
}
