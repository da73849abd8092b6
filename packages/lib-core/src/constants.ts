/**
 * Shared constants for the operational store packages.
 */

/**
 * Error codes returned in `error` fields of JSON error bodies
 */
export const ERROR_CODES = {
  CONFIGURATION_INVALID: 'configuration_invalid',
  STORE_FAILURE: 'store_failure',
  UNAUTHORIZED: 'unauthorized',
  SERVER_ERROR: 'server_error',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * Default database partition name used in log entries and health reports
 */
export const DEFAULT_PARTITION = 'default';
