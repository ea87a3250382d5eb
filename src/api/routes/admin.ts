/**
 * Admin routes.
 * POST /reload re-reads the config file and swaps the route table in one step;
 * requests already in flight keep the table they started with.
 */

import { Hono } from 'hono';
import { logger } from '../../shared/logger.js';
import { buildErrorResponse, ConfigError } from '../../shared/errors.js';
import type { RouteTableStore } from '../../routing/route-table.js';

export function createAdminRoutes(routes: RouteTableStore) {
  const app = new Hono();

  app.post('/reload', (c) => {
    try {
      const table = routes.reload();
      return c.json({
        reloaded: true,
        models: table.routes.size,
        enabled: table.enabledAliases,
      });
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      // The previous table stays live
      logger.error({ error: error.message }, 'Config reload failed');
      return c.json(buildErrorResponse('invalid_request_error', error.message, 'config_invalid'), 400);
    }
  });

  return app;
}
