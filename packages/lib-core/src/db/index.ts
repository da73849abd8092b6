/**
 * Database Module
 *
 * Usage:
 * ```typescript
 * import { createSqliteAdapter, type DatabaseAdapter } from '@opstore/lib-core';
 *
 * const adapter: DatabaseAdapter = createSqliteAdapter('operational.db', 'core');
 * ```
 */

export type {
  DatabaseAdapter,
  ExecuteResult,
  TransactionContext,
  HealthStatus,
  QueryOptions,
} from './adapter';

export {
  SqliteAdapter,
  createSqliteAdapter,
  isSqliteBusyError,
  type SqliteAdapterConfig,
} from './adapters/sqlite-adapter';
