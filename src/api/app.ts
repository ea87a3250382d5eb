/**
 * Hono application factory. Everything the routes need is injected, so tests
 * can drive the full HTTP surface through `app.request()` with an in-memory
 * database and a fake provider client.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { errorHandler } from './middleware/error-handler.js';
import { requestLog } from './middleware/request-log.js';
import { createAdminRoutes } from './routes/admin.js';
import { createChatRoutes } from './routes/chat.js';
import { createHealthRoutes } from './routes/health.js';
import { createModelsRoutes } from './routes/models.js';
import { createStatsRoutes, type StatsRouteOptions } from './routes/stats.js';
import type { Executor } from '../engine/executor.js';
import type { UsageAggregator } from '../persistence/aggregator.js';
import type { RequestLogger } from '../persistence/request-logger.js';
import type { ProviderClient } from '../providers/types.js';
import type { RouteTableStore } from '../routing/route-table.js';

export interface AppDeps {
  executor: Executor;
  routes: RouteTableStore;
  client: Pick<ProviderClient, 'getModelPricing'>;
  aggregator: UsageAggregator;
  requestLogger: Pick<RequestLogger, 'clearErrors'>;
  stats?: StatsRouteOptions;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  app.onError(errorHandler);
  // Browser dashboards on any origin read the ledger endpoints
  app.use('*', cors());
  app.use('*', requestLog);

  app.route('/health', createHealthRoutes(deps.routes));

  const chatRoutes = createChatRoutes(deps.executor);
  app.route('/v1', chatRoutes);
  app.route('/', chatRoutes);

  app.route('/', createModelsRoutes(deps.routes, deps.client));
  app.route('/', createStatsRoutes(deps.aggregator, deps.requestLogger, deps.stats));
  app.route('/admin', createAdminRoutes(deps.routes));

  return app;
}
