/**
 * Global error handler returning OpenAI-format errors.
 * Anything a route lets escape is classified the same way the execution
 * engine classifies provider failures, so clients see one error shape.
 */

import type { ErrorHandler } from 'hono';
import { classifyError } from '../../classification/classifier.js';
import { logger } from '../../shared/logger.js';
import { buildErrorResponse, ConfigError } from '../../shared/errors.js';

/**
 * Hono error handler.
 *
 * - ConfigError -> 500 without internal details
 * - classified errors (validation, resolution, provider) -> their mapped status
 * - anything else -> 500 generic server error
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json(buildErrorResponse('server_error', 'Internal configuration error', 'config_error'), 500);
  }

  const classified = classifyError(err);
  if (classified.kind === 'UnexpectedError') {
    logger.error({ err }, 'Unhandled error');
    return c.json(buildErrorResponse('server_error', 'Internal server error'), 500);
  }

  logger.warn({ kind: classified.kind, path: c.req.path }, classified.message);
  return c.json(buildErrorResponse(classified.type, classified.message, classified.code), classified.status);
};
