/**
 * GET /health handler.
 */

import { Hono } from 'hono';
import { VERSION } from '../../version.js';
import type { RouteTableStore } from '../../routing/route-table.js';

export function createHealthRoutes(routes: RouteTableStore) {
  const app = new Hono();

  app.get('/', (c) => {
    const table = routes.current;
    return c.json({
      status: 'ok',
      version: VERSION,
      uptime: process.uptime(),
      models: table.routes.size,
      enabled: table.enabledAliases.length,
    });
  });

  return app;
}
