/**
 * Token cleanup for the operational store
 *
 * @example
 * ```typescript
 * import { createSqliteAdapter } from '@opstore/lib-core';
 * import { SqlOperationalStore, TokenCleanupService, loadTokenCleanupOptionsFromEnv } from '@opstore/token-cleanup';
 *
 * const store = new SqlOperationalStore(createSqliteAdapter('operational.db'));
 * const service = new TokenCleanupService({ store, options: loadTokenCleanupOptionsFromEnv() });
 * await service.runCleanup();
 * ```
 */

export type * from './types';
export type * from './store/interfaces';
export {
  SqlOperationalStore,
  SqlRecordCollection,
  DEFAULT_GRANTS_TABLE,
  DEFAULT_DEVICE_CODES_TABLE,
  type SqlOperationalStoreConfig,
  type SqlRecordCollectionConfig,
} from './store/sql-operational-store';
export {
  noopOperationalStoreNotification,
  type OperationalStoreNotification,
} from './notification';
export {
  TokenCleanupOptionsSchema,
  DEFAULT_TOKEN_CLEANUP_BATCH_SIZE,
  MAX_TOKEN_CLEANUP_BATCH_SIZE,
  parseBatchSize,
  parseTokenCleanupOptions,
  loadTokenCleanupOptionsFromEnv,
  type TokenCleanupOptions,
  type TokenCleanupOptionsInput,
} from './options';
export { ConflictSafeCommitter, MAX_COMMIT_ATTEMPTS, type BatchOutcome } from './committer';
export {
  BatchSweeper,
  MAX_IDLE_BATCHES,
  type BatchSweeperConfig,
  type SweepStrategy,
  type SweepResult,
} from './sweeper';
export {
  TokenCleanupService,
  type TokenCleanupServiceConfig,
  type CleanupReport,
  type CleanupPhaseReport,
  type CleanupPhase,
} from './token-cleanup-service';
export { createTokenCleanupRoutes, type TokenCleanupRoutesOptions } from './routes';
