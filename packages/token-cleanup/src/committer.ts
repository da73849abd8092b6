/**
 * Conflict-Safe Committer
 *
 * Commits one batch of deletions. When the store reports a concurrency
 * conflict, the conflicting records are treated as already gone: they are
 * dropped from the pending set and the remainder is retried, for at most
 * MAX_COMMIT_ATTEMPTS attempts. Exhaustion abandons the batch without an
 * error; the leftover records are picked up by a later cleanup run.
 */

import type { Logger } from '@opstore/lib-core';
import type { RecordCollection } from './store/interfaces';

export const MAX_COMMIT_ATTEMPTS = 3;

export type BatchOutcome<T> =
  | {
      status: 'committed';
      /** Records deleted by the successful commit */
      removed: T[];
      /** Records another writer removed or changed first */
      dropped: T[];
      attempts: number;
    }
  | {
      status: 'abandoned';
      /** Records still awaiting deletion */
      pending: T[];
      dropped: T[];
      attempts: number;
    };

export class ConflictSafeCommitter {
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  async commit<T, S extends string, O extends string>(
    collection: RecordCollection<T, S, O>,
    batch: readonly T[],
    signal?: AbortSignal
  ): Promise<BatchOutcome<T>> {
    let pending = [...batch];
    const dropped: T[] = [];

    for (let attempt = 1; attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
      if (pending.length === 0) {
        return { status: 'committed', removed: [], dropped, attempts: attempt - 1 };
      }

      signal?.throwIfAborted();
      const result = await collection.remove(pending, signal);

      if (result.status === 'committed') {
        return { status: 'committed', removed: result.removed, dropped, attempts: attempt };
      }

      // Someone else already deleted or touched these; keep working without them
      const conflictKeys = new Set(result.conflicts.map((record) => collection.keyOf(record)));
      this.log.debug(`Concurrency conflict removing ${collection.name}`, {
        attempt,
        conflictCount: conflictKeys.size,
      });

      const remaining: T[] = [];
      for (const record of pending) {
        if (conflictKeys.has(collection.keyOf(record))) {
          dropped.push(record);
        } else {
          remaining.push(record);
        }
      }
      pending = remaining;
    }

    if (pending.length === 0) {
      return { status: 'committed', removed: [], dropped, attempts: MAX_COMMIT_ATTEMPTS };
    }

    this.log.debug(`Too many concurrency conflicts removing ${collection.name}, abandoning batch`, {
      attempts: MAX_COMMIT_ATTEMPTS,
      pendingCount: pending.length,
    });

    return { status: 'abandoned', pending, dropped, attempts: MAX_COMMIT_ATTEMPTS };
  }
}
