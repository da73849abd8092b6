/**
 * SQL Operational Store
 *
 * OperationalStore over a DatabaseAdapter. Grants live in `persisted_grants`
 * (primary key `key`), device codes in `device_flow_codes` (primary key
 * `device_code`); both table names can be overridden.
 *
 * Conflict detection: `remove` re-reads the targeted rows inside the
 * transaction. A row that is gone, or whose sweep fields (the allowlisted
 * stale and ordering columns) no longer match what was read, is a conflict; the transaction then deletes nothing and reports the
 * conflicting records. Otherwise all rows are deleted with one statement.
 */

import { ConfigurationError, type DatabaseAdapter, type HealthStatus } from '@opstore/lib-core';
import type { DeviceCodeOrderField, DeviceFlowCode, GrantStaleField, PersistedGrant } from '../types';
import type {
  CommitResult,
  DeviceCodeCollection,
  GrantCollection,
  OperationalStore,
  RecordCollection,
  StaleRecordQuery,
} from './interfaces';

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const DEFAULT_GRANTS_TABLE = 'persisted_grants';
export const DEFAULT_DEVICE_CODES_TABLE = 'device_flow_codes';

export interface SqlRecordCollectionConfig<T> {
  tableName: string;
  primaryKey: keyof T & string;
  /**
   * Fields accepted as stale predicate or ordering (prevents SQL injection).
   * Also the fields compared for conflict detection.
   */
  allowedFields: readonly string[];
}

function assertIdentifier(value: string, context: string): string {
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new ConfigurationError(`Invalid ${context}: ${value}`);
  }
  return value;
}

/**
 * Whether every sweep field read earlier still holds the same value.
 * Payload columns are not compared; BLOBs come back as new Buffers on each read.
 */
function isUnchanged(read: object, current: Record<string, unknown>, fields: ReadonlySet<string>): boolean {
  return Object.entries(read).every(([field, value]) => !fields.has(field) || current[field] === value);
}

export class SqlRecordCollection<T extends object, S extends string, O extends string>
  implements RecordCollection<T, S, O>
{
  private readonly adapter: DatabaseAdapter;
  private readonly tableName: string;
  private readonly primaryKey: keyof T & string;
  private readonly allowedFields: Set<string>;

  constructor(adapter: DatabaseAdapter, config: SqlRecordCollectionConfig<T>) {
    this.adapter = adapter;
    this.tableName = assertIdentifier(config.tableName, 'table name');
    this.primaryKey = config.primaryKey;
    assertIdentifier(config.primaryKey, 'primary key');
    this.allowedFields = new Set(config.allowedFields.map((f) => assertIdentifier(f, 'field name')));
  }

  get name(): string {
    return this.tableName;
  }

  keyOf(record: T): string {
    return String(record[this.primaryKey]);
  }

  async findStale(query: StaleRecordQuery<S, O>): Promise<T[]> {
    const staleField = this.validateFieldName(query.staleField, 'staleField');
    const orderBy = this.validateFieldName(query.orderBy, 'orderBy');

    const sql = `SELECT * FROM ${this.tableName} WHERE ${staleField} < ? ORDER BY ${orderBy} ASC LIMIT ?`;
    return this.adapter.query<T>(sql, [query.before, query.limit], { signal: query.signal });
  }

  async remove(records: readonly T[], signal?: AbortSignal): Promise<CommitResult<T>> {
    if (records.length === 0) {
      return { status: 'committed', removed: [] };
    }

    const keys = records.map((record) => this.keyOf(record));
    const placeholders = keys.map(() => '?').join(', ');

    return this.adapter.transaction(async (tx): Promise<CommitResult<T>> => {
      const rows = await tx.query<Record<string, unknown>>(
        `SELECT * FROM ${this.tableName} WHERE ${this.primaryKey} IN (${placeholders})`,
        keys
      );
      const current = new Map(rows.map((row) => [String(row[this.primaryKey]), row]));

      const conflicts = records.filter((record) => {
        const row = current.get(this.keyOf(record));
        return row === undefined || !isUnchanged(record, row, this.allowedFields);
      });
      if (conflicts.length > 0) {
        return { status: 'conflicted', conflicts };
      }

      await tx.execute(`DELETE FROM ${this.tableName} WHERE ${this.primaryKey} IN (${placeholders})`, keys);
      return { status: 'committed', removed: [...records] };
    }, { signal });
  }

  private validateFieldName(field: string, context: string): string {
    if (!this.allowedFields.has(field)) {
      throw new ConfigurationError(`Field '${field}' is not allowed for ${context} on ${this.tableName}`);
    }
    return field;
  }
}

export interface SqlOperationalStoreConfig {
  grantsTable?: string;
  deviceCodesTable?: string;
}

export class SqlOperationalStore implements OperationalStore {
  readonly grants: GrantCollection;
  readonly deviceCodes: DeviceCodeCollection;
  private readonly adapter: DatabaseAdapter;

  constructor(adapter: DatabaseAdapter, config: SqlOperationalStoreConfig = {}) {
    this.adapter = adapter;
    this.grants = new SqlRecordCollection<PersistedGrant, GrantStaleField, GrantStaleField>(adapter, {
      tableName: config.grantsTable ?? DEFAULT_GRANTS_TABLE,
      primaryKey: 'key',
      allowedFields: ['expiration', 'consumed_time'],
    });
    this.deviceCodes = new SqlRecordCollection<DeviceFlowCode, 'expiration', DeviceCodeOrderField>(
      adapter,
      {
        tableName: config.deviceCodesTable ?? DEFAULT_DEVICE_CODES_TABLE,
        primaryKey: 'device_code',
        allowedFields: ['expiration', 'device_code'],
      }
    );
  }

  isHealthy(): Promise<HealthStatus> {
    return this.adapter.isHealthy();
  }
}
