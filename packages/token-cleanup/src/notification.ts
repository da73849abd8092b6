/**
 * Operational Store Notification
 *
 * Hook for code that mirrors the operational store elsewhere (caches, audit
 * trails, revocation lists). Called after each committed cleanup batch with
 * exactly the records that batch removed.
 */

import type { DeviceFlowCode, PersistedGrant } from './types';

export interface OperationalStoreNotification {
  persistedGrantsRemoved(grants: readonly PersistedGrant[]): Promise<void>;
  deviceCodesRemoved(codes: readonly DeviceFlowCode[]): Promise<void>;
}

/**
 * Used when no notification sink is configured
 */
export const noopOperationalStoreNotification: OperationalStoreNotification = {
  persistedGrantsRemoved: async () => {},
  deviceCodesRemoved: async () => {},
};
