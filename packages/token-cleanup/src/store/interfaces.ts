/**
 * Operational Store Interfaces
 *
 * Contract between the cleanup job and the store holding grants and device
 * codes. Implementations must make `remove` all-or-nothing: a call either
 * deletes every record it was given or deletes none of them.
 */

import type { HealthStatus } from '@opstore/lib-core';
import type {
  DeviceCodeOrderField,
  DeviceFlowCode,
  GrantStaleField,
  PersistedGrant,
} from '../types';

/**
 * Range query for records whose `staleField` lies before `before`
 */
export interface StaleRecordQuery<S extends string, O extends string> {
  staleField: S;
  /** Sorted ascending */
  orderBy: O;
  /** Epoch milliseconds; records with `staleField < before` match */
  before: number;
  limit: number;
  signal?: AbortSignal;
}

/**
 * Outcome of one deletion commit.
 *
 * `conflicted` means some records were already removed or modified by another
 * writer since they were read. Nothing was deleted in that case.
 */
export type CommitResult<T> =
  | { status: 'committed'; removed: T[] }
  | { status: 'conflicted'; conflicts: T[] };

/**
 * One kind of record in the store
 *
 * @typeParam T - Row type
 * @typeParam S - Fields usable as the staleness predicate
 * @typeParam O - Fields usable for ordering
 */
export interface RecordCollection<T, S extends string, O extends string> {
  /** Table or collection name, used in logs */
  readonly name: string;
  /** Identity of a record */
  keyOf(record: T): string;
  findStale(query: StaleRecordQuery<S, O>): Promise<T[]>;
  remove(records: readonly T[], signal?: AbortSignal): Promise<CommitResult<T>>;
}

export type GrantCollection = RecordCollection<PersistedGrant, GrantStaleField, GrantStaleField>;

export type DeviceCodeCollection = RecordCollection<DeviceFlowCode, 'expiration', DeviceCodeOrderField>;

export interface OperationalStore {
  readonly grants: GrantCollection;
  readonly deviceCodes: DeviceCodeCollection;
  isHealthy(): Promise<HealthStatus>;
}
