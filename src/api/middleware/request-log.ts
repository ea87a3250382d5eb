/**
 * Access log middleware: one debug line per HTTP request.
 */

import { createMiddleware } from 'hono/factory';
import { logger } from '../../shared/logger.js';

export const requestLog = createMiddleware(async (c, next) => {
  const start = performance.now();
  await next();
  logger.debug(
    {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    },
    `${c.req.method} ${c.req.path} ${c.res.status}`,
  );
});
