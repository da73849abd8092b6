/**
 * Test fixtures for token cleanup
 *
 * - Record factories
 * - In-memory OperationalStore with hooks to simulate concurrent writers
 * - Logger stub
 */

import { vi } from 'vitest';
import type { HealthStatus, Logger } from '@opstore/lib-core';
import type {
  CommitResult,
  OperationalStore,
  RecordCollection,
  StaleRecordQuery,
} from '../store/interfaces';
import type { DeviceCodeOrderField, DeviceFlowCode, GrantStaleField, PersistedGrant } from '../types';

export const NOW = 1_700_000_000_000;
export const HOUR = 60 * 60 * 1000;

export function makeGrant(key: string, overrides: Partial<PersistedGrant> = {}): PersistedGrant {
  return {
    key,
    type: 'refresh_token',
    subject_id: 'user-1',
    session_id: null,
    client_id: 'client-1',
    description: null,
    creation_time: NOW - 24 * HOUR,
    expiration: NOW - 1000,
    consumed_time: null,
    data: '{}',
    ...overrides,
  };
}

export function makeDeviceCode(deviceCode: string, overrides: Partial<DeviceFlowCode> = {}): DeviceFlowCode {
  return {
    device_code: deviceCode,
    user_code: `USER-${deviceCode}`,
    subject_id: null,
    session_id: null,
    client_id: 'tv-client',
    description: null,
    creation_time: NOW - HOUR,
    expiration: NOW - 1000,
    data: '{}',
    ...overrides,
  };
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * In-memory record collection
 *
 * Mirrors the SQL store: stale predicate excludes null timestamps, `remove`
 * deletes nothing and reports conflicts when a record is gone or one of its
 * watched fields changed.
 */
export class MemoryRecordCollection<
  T extends object,
  S extends keyof T & string,
  O extends keyof T & string,
> implements RecordCollection<T, S, O>
{
  readonly rows = new Map<string, T>();
  readonly queries: Array<StaleRecordQuery<S, O>> = [];
  readonly removeCalls: T[][] = [];

  /** Called before each remove attempt; lets a test play a concurrent writer */
  beforeRemove?: (pending: readonly T[], attempt: number) => void;
  /** Makes findStale reject */
  findStaleError?: Error;

  constructor(
    readonly name: string,
    private readonly primaryKey: keyof T & string,
    private readonly watchedFields: ReadonlyArray<keyof T & string>
  ) {}

  keyOf(record: T): string {
    return String(record[this.primaryKey]);
  }

  seed(records: T[]): void {
    for (const record of records) {
      this.rows.set(this.keyOf(record), { ...record });
    }
  }

  keys(): string[] {
    return [...this.rows.keys()].sort();
  }

  async findStale(query: StaleRecordQuery<S, O>): Promise<T[]> {
    this.queries.push(query);
    query.signal?.throwIfAborted();
    if (this.findStaleError) {
      throw this.findStaleError;
    }

    return [...this.rows.values()]
      .filter((record) => {
        const value = record[query.staleField];
        return typeof value === 'number' && value < query.before;
      })
      .sort((a, b) => compareValues(a[query.orderBy], b[query.orderBy]))
      .slice(0, query.limit)
      .map((record) => ({ ...record }));
  }

  async remove(records: readonly T[], signal?: AbortSignal): Promise<CommitResult<T>> {
    this.removeCalls.push([...records]);
    signal?.throwIfAborted();
    this.beforeRemove?.(records, this.removeCalls.length);

    const conflicts = records.filter((record) => {
      const current = this.rows.get(this.keyOf(record));
      return current === undefined || this.watchedFields.some((field) => current[field] !== record[field]);
    });
    if (conflicts.length > 0) {
      return { status: 'conflicted', conflicts };
    }

    for (const record of records) {
      this.rows.delete(this.keyOf(record));
    }
    return { status: 'committed', removed: [...records] };
  }
}

export class MemoryOperationalStore implements OperationalStore {
  readonly grants = new MemoryRecordCollection<PersistedGrant, GrantStaleField, GrantStaleField>(
    'persisted_grants',
    'key',
    ['expiration', 'consumed_time']
  );
  readonly deviceCodes = new MemoryRecordCollection<DeviceFlowCode, 'expiration', DeviceCodeOrderField>(
    'device_flow_codes',
    'device_code',
    ['expiration', 'device_code']
  );
  healthy = true;

  async isHealthy(): Promise<HealthStatus> {
    return { healthy: this.healthy, latencyMs: 0, type: 'memory' };
  }
}

/**
 * Logger whose methods are mocks; child() and module() return the same stub
 */
export function createTestLogger() {
  const logger = {
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    debug: vi.fn<Logger['debug']>(),
    child: vi.fn<Logger['child']>(),
    module: vi.fn<Logger['module']>(),
    startTimer: vi.fn<Logger['startTimer']>(() => () => {}),
  };
  logger.child.mockReturnValue(logger);
  logger.module.mockReturnValue(logger);
  return logger;
}

export type TestLogger = ReturnType<typeof createTestLogger>;
