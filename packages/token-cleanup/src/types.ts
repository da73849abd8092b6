/**
 * Operational record types
 *
 * Rows of the operational store. Timestamps are epoch milliseconds.
 */

/**
 * A persisted authorization grant (authorization code, refresh token,
 * reference token, user consent, ...)
 */
export interface PersistedGrant {
  key: string;
  type: string;
  subject_id: string | null;
  session_id: string | null;
  client_id: string;
  description: string | null;
  creation_time: number;
  /** Null for grants that never expire */
  expiration: number | null;
  /** Set once a one-time grant has been used */
  consumed_time: number | null;
  /** Serialized grant payload, opaque to the cleanup job */
  data: string;
}

/**
 * Pending device authorization (RFC 8628)
 */
export interface DeviceFlowCode {
  device_code: string;
  user_code: string;
  subject_id: string | null;
  session_id: string | null;
  client_id: string;
  description: string | null;
  creation_time: number;
  expiration: number;
  data: string;
}

/** Timestamp columns that make a grant stale */
export type GrantStaleField = 'expiration' | 'consumed_time';

/** Columns a device code sweep may be ordered by */
export type DeviceCodeOrderField = 'expiration' | 'device_code';
