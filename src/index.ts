/**
 * llm-tally application entry point.
 * Bootstraps configuration, the usage ledger, the route table and provider
 * client, creates the Hono application and starts the HTTP server.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { ConfigError } from './shared/errors.js';
import { applyEnvOverrides, loadConfig, resolveConfigPath } from './config/loader.js';
import { initializeDatabase } from './persistence/db.js';
import { migrateSchema } from './persistence/schema.js';
import { RequestLogger } from './persistence/request-logger.js';
import { UsageAggregator } from './persistence/aggregator.js';
import { buildRouteTable, RouteTableStore } from './routing/route-table.js';
import { LlmClient } from './providers/client.js';
import { Executor } from './engine/executor.js';
import { createApp } from './api/app.js';
import { VERSION } from './version.js';
import type { Config } from './config/types.js';

// --- Bootstrap ---

logger.info(`llm-tally v${VERSION} starting...`);

const configPath = resolveConfigPath();

let config: Config;
try {
  const loaded = loadConfig(configPath);
  config = { ...loaded, settings: applyEnvOverrides(loaded.settings) };
} catch (error) {
  if (error instanceof ConfigError) {
    logger.fatal(error.message);
    process.exit(1);
  }
  throw error;
}

// Update logger level from config
logger.level = config.settings.logLevel;

// --- Initialize usage ledger ---
const db = initializeDatabase(config.settings.dbPath);
migrateSchema(db);
const requestLogger = new RequestLogger(db);
const aggregator = new UsageAggregator(db);

// --- Routing and execution ---
const routes = new RouteTableStore(buildRouteTable(config.models), () => buildRouteTable(loadConfig(configPath).models));
const client = new LlmClient();
const executor = new Executor({
  routes,
  client,
  ledger: requestLogger,
  options: {
    defaults: {
      timeout: config.settings.defaultTimeout,
      numRetries: config.settings.defaultRetries,
    },
    drainOnDisconnect: config.settings.drainOnDisconnect,
  },
});

const app = createApp({ executor, routes, client, aggregator, requestLogger });

// --- Start server ---

const server = serve(
  {
    fetch: app.fetch,
    port: config.settings.port,
    hostname: config.settings.host,
  },
  (info) => {
    logger.info({ port: info.port, host: config.settings.host }, `llm-tally listening on port ${info.port}`);
    logger.info(
      {
        models: routes.current.routes.size,
        enabled: routes.current.enabledAliases,
        dbPath: config.settings.dbPath,
      },
      'Ready',
    );
  },
);

// --- Reload on SIGHUP ---

process.on('SIGHUP', () => {
  try {
    routes.reload();
  } catch (error) {
    logger.error(
      { error: error instanceof Error ? error.message : String(error) },
      'Config reload failed, keeping the previous route table',
    );
  }
});

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  server.close(() => {
    logger.info('Server closed');
    db.close();
    logger.info('Database closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// --- Unhandled rejection handler ---

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
