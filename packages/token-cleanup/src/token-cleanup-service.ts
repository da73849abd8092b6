/**
 * Token Cleanup Service
 *
 * Removes stale persisted grants and device flow codes from the operational
 * store. Meant to be invoked by an external scheduler (cron, timer, HTTP
 * trigger); it never schedules itself.
 *
 * `runCleanup` runs the grant phase and then the device code phase. A failure
 * in one phase is logged and does not stop the other, and the call always
 * resolves, so a recurring scheduler can keep calling it after a bad cycle.
 *
 * Overlapping runs (timer ticks, replicas sharing one database) are tolerated
 * through the store's conflict detection but duplicate query traffic. Put a
 * single-flight lock in front of it when that matters.
 */

import { createLogger, type Logger } from '@opstore/lib-core';
import { ConflictSafeCommitter } from './committer';
import {
  noopOperationalStoreNotification,
  type OperationalStoreNotification,
} from './notification';
import {
  parseTokenCleanupOptions,
  type TokenCleanupOptions,
  type TokenCleanupOptionsInput,
} from './options';
import type { OperationalStore } from './store/interfaces';
import { BatchSweeper, type SweepResult, type SweepStrategy } from './sweeper';
import type { DeviceCodeOrderField, DeviceFlowCode, GrantStaleField, PersistedGrant } from './types';

export type CleanupPhase = 'grants' | 'device_codes';

export interface CleanupPhaseReport {
  phase: CleanupPhase;
  status: 'completed' | 'failed' | 'cancelled';
  sweeps: SweepResult[];
  /** Error message when the phase did not complete */
  error?: string;
}

export interface CleanupReport {
  /** Epoch milliseconds */
  startedAt: number;
  durationMs: number;
  phases: CleanupPhaseReport[];
}

export interface TokenCleanupServiceConfig {
  store: OperationalStore;
  options?: TokenCleanupOptionsInput;
  notification?: OperationalStoreNotification;
  logger?: Logger;
  /** Epoch-milliseconds clock (default: Date.now) */
  clock?: () => number;
}

export class TokenCleanupService {
  private readonly options: TokenCleanupOptions;
  private readonly store: OperationalStore;
  private readonly notification: OperationalStoreNotification;
  private readonly log: Logger;
  private readonly clock: () => number;
  private readonly sweeper: BatchSweeper;

  /**
   * @throws ConfigurationError when the options are invalid (e.g. batch size below 1)
   */
  constructor(config: TokenCleanupServiceConfig) {
    this.options = parseTokenCleanupOptions(config.options);
    this.store = config.store;
    this.notification = config.notification ?? noopOperationalStoreNotification;
    this.log = (config.logger ?? createLogger()).module('TOKEN-CLEANUP');
    this.clock = config.clock ?? Date.now;
    this.sweeper = new BatchSweeper({
      batchSize: this.options.batchSize,
      committer: new ConflictSafeCommitter(this.log),
      logger: this.log,
      clock: this.clock,
    });
  }

  getOptions(): TokenCleanupOptions {
    return { ...this.options };
  }

  /**
   * Remove stale grants, then stale device codes. Never rejects.
   */
  async runCleanup(signal?: AbortSignal): Promise<CleanupReport> {
    const startedAt = this.clock();
    this.log.debug('Querying for expired grants to remove');

    const phases = [
      await this.runPhase('grants', () => this.removeGrants(signal), signal),
      await this.runPhase('device_codes', () => this.removeDeviceCodes(signal), signal),
    ];

    return { startedAt, durationMs: this.clock() - startedAt, phases };
  }

  /**
   * Remove expired grants and, when enabled, consumed grants.
   * Store and notification errors propagate.
   */
  async removeGrants(signal?: AbortSignal): Promise<SweepResult[]> {
    const results = [await this.sweeper.sweep(this.grantSweep('expired grants', 'expiration'), signal)];

    if (this.options.removeConsumedGrants) {
      results.push(await this.sweeper.sweep(this.grantSweep('consumed grants', 'consumed_time'), signal));
    }

    return results;
  }

  /**
   * Remove expired device flow codes. Store and notification errors propagate.
   */
  async removeDeviceCodes(signal?: AbortSignal): Promise<SweepResult[]> {
    return [await this.sweeper.sweep(this.deviceCodeSweep(this.options.deviceCodeOrderBy), signal)];
  }

  private grantSweep(
    label: string,
    field: GrantStaleField
  ): SweepStrategy<PersistedGrant, GrantStaleField, GrantStaleField> {
    return {
      label,
      collection: this.store.grants,
      staleField: field,
      orderBy: field,
      notify: (grants) => this.notification.persistedGrantsRemoved(grants),
    };
  }

  private deviceCodeSweep(
    orderBy: DeviceCodeOrderField
  ): SweepStrategy<DeviceFlowCode, 'expiration', DeviceCodeOrderField> {
    return {
      label: 'device flow codes',
      collection: this.store.deviceCodes,
      staleField: 'expiration',
      orderBy,
      notify: (codes) => this.notification.deviceCodesRemoved(codes),
    };
  }

  private async runPhase(
    phase: CleanupPhase,
    run: () => Promise<SweepResult[]>,
    signal?: AbortSignal
  ): Promise<CleanupPhaseReport> {
    try {
      return { phase, status: 'completed', sweeps: await run() };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));

      if (signal?.aborted) {
        this.log.warn(`Token cleanup cancelled during ${phase}`, { phase });
        return { phase, status: 'cancelled', sweeps: [], error: err.message };
      }

      this.log.error(`Exception removing stale ${phase}`, { phase }, err);
      return { phase, status: 'failed', sweeps: [], error: err.message };
    }
  }
}
