/**
 * Token cleanup options
 *
 * Validated with zod at service construction. Invalid options throw a
 * ConfigurationError.
 */

import { z } from 'zod';
import { ConfigurationError } from '@opstore/lib-core';

export const DEFAULT_TOKEN_CLEANUP_BATCH_SIZE = 100;
/** Keeps one commit's key list under SQLite's bound-parameter limit */
export const MAX_TOKEN_CLEANUP_BATCH_SIZE = 10_000;

export const TokenCleanupOptionsSchema = z.object({
  /** Records fetched and deleted per round trip */
  batchSize: z
    .number()
    .int()
    .min(1, 'Token cleanup batch size must be at least 1')
    .max(MAX_TOKEN_CLEANUP_BATCH_SIZE, `Token cleanup batch size must be at most ${MAX_TOKEN_CLEANUP_BATCH_SIZE}`)
    .default(DEFAULT_TOKEN_CLEANUP_BATCH_SIZE),
  /** Also remove grants whose consumed time has passed, even if not yet expired */
  removeConsumedGrants: z.boolean().default(false),
  /**
   * Device code sweep ordering. 'expiration' removes the oldest stale codes
   * first; 'device_code' orders by identifier for deployments relying on the
   * legacy order.
   */
  deviceCodeOrderBy: z.enum(['expiration', 'device_code']).default('expiration'),
});

export type TokenCleanupOptions = z.infer<typeof TokenCleanupOptionsSchema>;
export type TokenCleanupOptionsInput = z.input<typeof TokenCleanupOptionsSchema>;

const TokenCleanupEnvSchema = z.object({
  TOKEN_CLEANUP_BATCH_SIZE: z.coerce.number().int().optional(),
  TOKEN_CLEANUP_REMOVE_CONSUMED: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  TOKEN_CLEANUP_DEVICE_CODE_ORDER: z.enum(['expiration', 'device_code']).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function parseTokenCleanupOptions(input: TokenCleanupOptionsInput = {}): TokenCleanupOptions {
  const parsed = TokenCleanupOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid token cleanup options: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Validate a batch size on its own, for components built without the full
 * options object.
 */
export function parseBatchSize(batchSize: number): number {
  const parsed = TokenCleanupOptionsSchema.shape.batchSize.safeParse(batchSize);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `batchSize: ${issue.message}`);
    throw new ConfigurationError(`Invalid batch size: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Read options from environment variables. Unset variables fall back to the
 * defaults.
 *
 * - TOKEN_CLEANUP_BATCH_SIZE: positive integer (default: 100)
 * - TOKEN_CLEANUP_REMOVE_CONSUMED: "true" | "false" (default: "false")
 * - TOKEN_CLEANUP_DEVICE_CODE_ORDER: "expiration" | "device_code" (default: "expiration")
 */
export function loadTokenCleanupOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): TokenCleanupOptions {
  const parsed = TokenCleanupEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid token cleanup environment: ${issues.join('; ')}`, issues);
  }

  return parseTokenCleanupOptions({
    batchSize: parsed.data.TOKEN_CLEANUP_BATCH_SIZE,
    removeConsumedGrants: parsed.data.TOKEN_CLEANUP_REMOVE_CONSUMED,
    deviceCodeOrderBy: parsed.data.TOKEN_CLEANUP_DEVICE_CODE_ORDER,
  });
}
