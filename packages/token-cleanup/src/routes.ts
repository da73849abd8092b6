/**
 * Token Cleanup Admin Routes
 *
 * Lets an external scheduler or an operator trigger a cleanup run over HTTP:
 * - POST /token-cleanup - Run one cleanup cycle and return its report
 * - GET  /health        - Operational store health
 *
 * Security:
 * - Bearer token required on every route (compared in constant time by hono)
 *
 * @packageDocumentation
 */

import { Hono } from 'hono';
import { bearerAuth } from 'hono/bearer-auth';
import { ConfigurationError, HTTP_STATUS, handleOperationalError } from '@opstore/lib-core';
import type { OperationalStore } from './store/interfaces';
import type { TokenCleanupService } from './token-cleanup-service';

export interface TokenCleanupRoutesOptions {
  /** Shared secret expected in `Authorization: Bearer <token>` */
  adminToken: string;
}

/**
 * Build the admin routes. Mount them under a prefix of the host app:
 *
 * @example
 * app.route('/internal', createTokenCleanupRoutes(service, store, { adminToken: env.ADMIN_API_SECRET }));
 */
export function createTokenCleanupRoutes(
  service: TokenCleanupService,
  store: OperationalStore,
  options: TokenCleanupRoutesOptions
): Hono {
  if (options.adminToken.length === 0) {
    throw new ConfigurationError('Token cleanup routes require a non-empty admin token');
  }

  const app = new Hono();

  app.use('*', bearerAuth({ token: options.adminToken }));

  app.post('/token-cleanup', async (c) => {
    // runCleanup never rejects; failures are reported per phase
    const report = await service.runCleanup(c.req.raw.signal);
    return c.json(report);
  });

  app.get('/health', async (c) => {
    const health = await store.isHealthy();
    return c.json(health, health.healthy ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE);
  });

  app.onError(handleOperationalError);

  return app;
}
