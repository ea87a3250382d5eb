/**
 * Model listing routes.
 * GET /v1/models: OpenAI list format, enabled aliases only.
 * GET /models: every alias with its provider tag and per-million pricing.
 */

import { Hono } from 'hono';
import { listRoutes, type RouteTableStore } from '../../routing/route-table.js';
import type { ProviderClient } from '../../providers/types.js';
import type { ModelInfo, ModelsResponse } from '../../shared/types.js';

export function createModelsRoutes(routes: RouteTableStore, client: Pick<ProviderClient, 'getModelPricing'>) {
  const app = new Hono();

  app.get('/v1/models', (c) => {
    const table = routes.current;
    const created = Math.floor(Date.now() / 1000);

    const data: ModelInfo[] = [];
    for (const alias of table.enabledAliases) {
      const route = table.routes.get(alias);
      if (route) {
        data.push({ id: alias, object: 'model', created, owned_by: route.provider });
      }
    }

    const body: ModelsResponse = { object: 'list', data };
    return c.json(body);
  });

  app.get('/models', (c) => {
    return c.json({ models: listRoutes(routes.current, client) });
  });

  return app;
}
