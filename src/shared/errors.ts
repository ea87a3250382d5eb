/**
 * Proxy-level error classes.
 * Provider failures live in providers/errors.ts; everything here is raised by
 * the proxy itself (config, request validation, alias resolution).
 */

import type { OpenAIErrorResponse } from './types.js';

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A client request or query string failed validation. */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

/** Base class for alias resolution failures; carries the enabled aliases as a hint. */
export abstract class RouteResolutionError extends Error {
  public readonly alias: string;
  public readonly available: readonly string[];

  constructor(alias: string, available: readonly string[], message: string) {
    const hint = available.length > 0 ? ` Available models: ${available.join(', ')}` : '';
    super(`${message}${hint}`);
    this.alias = alias;
    this.available = available;
  }
}

/** The requested alias is not configured. */
export class ModelNotFoundError extends RouteResolutionError {
  constructor(alias: string, available: readonly string[]) {
    super(alias, available, `Model '${alias}' not found in configuration.`);
    this.name = 'ModelNotFoundError';
  }
}

/** The requested alias exists but is switched off. */
export class ModelDisabledError extends RouteResolutionError {
  constructor(alias: string, available: readonly string[]) {
    super(alias, available, `Model '${alias}' is disabled.`);
    this.name = 'ModelDisabledError';
  }
}

/**
 * Build an OpenAI-compatible error body.
 * `code` is left out entirely when not given, matching upstream responses.
 */
export function buildErrorResponse(
  type: string,
  message: string,
  code?: string | null,
): OpenAIErrorResponse {
  return {
    error: {
      message,
      type,
      ...(code ? { code } : {}),
    },
  };
}
