/**
 * Batch Sweeper
 *
 * Removes one kind of stale record in batches of at most `batchSize`, oldest
 * first. What is swept is described by a SweepStrategy; the loop itself is
 * the same for every kind.
 *
 * Termination: the loop stops on the first batch smaller than `batchSize`.
 * That is a heuristic, not a proof the backlog is empty: writers inserting
 * already-stale records faster than the sweep drains them keep it running
 * longer than one backlog pass.
 *
 * An abandoned batch does not end the sweep; its records are re-read by the
 * next query. Records that keep conflicting would be returned by every query,
 * so MAX_IDLE_BATCHES consecutive batches that remove nothing end the sweep.
 */

import type { Logger } from '@opstore/lib-core';
import type { ConflictSafeCommitter } from './committer';
import { parseBatchSize } from './options';
import type { RecordCollection } from './store/interfaces';

/** Consecutive full batches removing nothing before a sweep gives up */
export const MAX_IDLE_BATCHES = 2;

export interface SweepStrategy<T, S extends string, O extends string> {
  /** Human-readable name used in log lines, e.g. "expired grants" */
  readonly label: string;
  readonly collection: RecordCollection<T, S, O>;
  /** Records with this field in the past are eligible */
  readonly staleField: S;
  readonly orderBy: O;
  /** Receives the records of each committed batch */
  notify(records: readonly T[]): Promise<void>;
}

export interface SweepResult {
  label: string;
  /** Stale-record queries issued */
  queries: number;
  /** Batches committed */
  batches: number;
  removed: number;
  /** Records skipped because another writer got to them first */
  dropped: number;
  /** Whether the committer gave up on at least one batch */
  abandoned: boolean;
  /** Whether the sweep ended because consecutive batches removed nothing */
  stalled: boolean;
}

export interface BatchSweeperConfig {
  batchSize: number;
  committer: ConflictSafeCommitter;
  logger: Logger;
  /** Epoch-milliseconds clock (default: Date.now) */
  clock?: () => number;
}

export class BatchSweeper {
  private readonly batchSize: number;
  private readonly committer: ConflictSafeCommitter;
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(config: BatchSweeperConfig) {
    this.batchSize = parseBatchSize(config.batchSize);
    this.committer = config.committer;
    this.log = config.logger;
    this.clock = config.clock ?? Date.now;
  }

  async sweep<T, S extends string, O extends string>(
    strategy: SweepStrategy<T, S, O>,
    signal?: AbortSignal
  ): Promise<SweepResult> {
    const result: SweepResult = {
      label: strategy.label,
      queries: 0,
      batches: 0,
      removed: 0,
      dropped: 0,
      abandoned: false,
      stalled: false,
    };

    let found = Number.MAX_SAFE_INTEGER;
    let idleBatches = 0;

    while (found >= this.batchSize) {
      signal?.throwIfAborted();

      const batch = await strategy.collection.findStale({
        staleField: strategy.staleField,
        orderBy: strategy.orderBy,
        before: this.clock(),
        limit: this.batchSize,
        signal,
      });
      result.queries++;

      found = batch.length;
      this.log.info(`Removing ${found} ${strategy.label}`, { count: found });

      if (found === 0) {
        break;
      }

      const outcome = await this.committer.commit(strategy.collection, batch, signal);
      result.dropped += outcome.dropped.length;

      if (outcome.status === 'abandoned') {
        result.abandoned = true;
      } else {
        result.batches++;
        result.removed += outcome.removed.length;

        if (outcome.removed.length > 0) {
          await strategy.notify(outcome.removed);
        }
      }

      idleBatches = outcome.status === 'committed' && outcome.removed.length > 0 ? 0 : idleBatches + 1;
      if (idleBatches >= MAX_IDLE_BATCHES && found >= this.batchSize) {
        this.log.warn(`Stopping sweep of ${strategy.label}: ${idleBatches} batches in a row removed nothing`, {
          idleBatches,
        });
        result.stalled = true;
        break;
      }
    }

    return result;
  }
}
