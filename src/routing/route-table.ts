/**
 * Model route table: alias -> provider call parameters.
 *
 * Tables are immutable snapshots built wholesale from config. The store swaps
 * the whole snapshot in one assignment, so a request that read `current`
 * keeps a consistent view while a reload happens.
 */

import { logger } from '../shared/logger.js';
import { ModelDisabledError, ModelNotFoundError } from '../shared/errors.js';
import { ENV_REF_PATTERN } from '../config/schema.js';
import { inferProviderFromModel, UNKNOWN_PROVIDER } from '../providers/infer.js';
import { perMillion } from '../providers/pricing.js';
import type { ModelConfig } from '../config/types.js';
import type { ProviderClient, PricingOverride } from '../providers/types.js';
import type { ChatCompletionRequest } from '../shared/types.js';
import type { ModelRoute, ResolvedRequest, RouteDefaults, RouteListing, RouteTable } from './types.js';

/** Keys that never take part in the parameter merge. */
const RESERVED_KEYS: ReadonlySet<string> = new Set([
  'model',
  'stream',
  'api_key',
  'api_base',
  'input_cost_per_million',
  'output_cost_per_million',
]);

type Env = Readonly<Record<string, string | undefined>>;

/** Build a frozen table from validated model configs. */
export function buildRouteTable(models: readonly ModelConfig[]): RouteTable {
  const routes = new Map<string, ModelRoute>();

  for (const config of models) {
    routes.set(config.alias, Object.freeze(buildRoute(config)));
  }

  const enabledAliases = [...routes.values()]
    .filter((route) => route.enabled)
    .map((route) => route.alias)
    .sort();

  return Object.freeze({ routes, enabledAliases: Object.freeze(enabledAliases) });
}

function buildRoute(config: ModelConfig): ModelRoute {
  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config.params)) {
    if (!RESERVED_KEYS.has(key)) {
      params[key] = value;
    }
  }
  if (config.temperature !== undefined) params['temperature'] = config.temperature;
  if (config.maxTokens !== undefined) params['max_tokens'] = config.maxTokens;
  if (config.timeout !== undefined) params['timeout'] = config.timeout;
  if (config.numRetries !== undefined) params['num_retries'] = config.numRetries;

  const inferred = inferProviderFromModel(config.model);
  const pricing: PricingOverride | undefined =
    config.inputCostPerMillion !== undefined || config.outputCostPerMillion !== undefined
      ? Object.freeze({
          inputCostPerMillion: config.inputCostPerMillion,
          outputCostPerMillion: config.outputCostPerMillion,
        })
      : undefined;

  return {
    alias: config.alias,
    model: config.model,
    provider: inferred === UNKNOWN_PROVIDER && config.apiBase ? 'custom' : inferred,
    apiKeyRef: config.apiKey,
    apiBase: config.apiBase,
    enabled: config.enabled,
    pricing,
    params: Object.freeze(params),
  };
}

/**
 * Holds the live route table. Readers take `current` once per request.
 */
export class RouteTableStore {
  private table: RouteTable;
  private readonly load: (() => RouteTable) | undefined;

  constructor(initial: RouteTable, load?: () => RouteTable) {
    this.table = initial;
    this.load = load;
  }

  get current(): RouteTable {
    return this.table;
  }

  swap(table: RouteTable): void {
    this.table = table;
  }

  /**
   * Rebuild the table from its source and swap it in.
   * On failure the previous table stays live and the error propagates.
   */
  reload(): RouteTable {
    if (!this.load) {
      throw new Error('Route table has no source to reload from');
    }
    const next = this.load();
    this.swap(next);
    logger.info({ models: next.routes.size, enabled: next.enabledAliases.length }, 'Route table reloaded');
    return next;
  }
}

/** Resolve an `env:NAME` reference now; any other string is a literal key. */
export function resolveApiKey(ref: string | undefined, env: Env): string | undefined {
  if (!ref) {
    return undefined;
  }
  const match = ENV_REF_PATTERN.exec(ref);
  if (!match) {
    return ref;
  }
  const value = env[match[1] ?? ''];
  return value ? value : undefined;
}

/**
 * Resolve a client request against a table snapshot.
 * Client values win over route defaults unless null; global defaults fill
 * timeout and retries last. Neither the table nor the request is mutated.
 *
 * @throws ModelNotFoundError when the alias is not configured
 * @throws ModelDisabledError when the alias is switched off
 */
export function resolveRoute(
  table: RouteTable,
  request: ChatCompletionRequest,
  defaults: RouteDefaults,
  env: Env = process.env,
): ResolvedRequest {
  const alias = request.model;
  const route = table.routes.get(alias);
  if (!route) {
    throw new ModelNotFoundError(alias, table.enabledAliases);
  }
  if (!route.enabled) {
    throw new ModelDisabledError(alias, table.enabledAliases);
  }

  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(request)) {
    if (!RESERVED_KEYS.has(key) && value !== null && value !== undefined) {
      params[key] = value;
    }
  }
  for (const [key, value] of Object.entries(route.params)) {
    if (params[key] === undefined) {
      params[key] = value;
    }
  }

  const timeout = takeNumber(params, 'timeout') ?? defaults.timeout;
  const numRetries = takeNumber(params, 'num_retries') ?? defaults.numRetries;

  return {
    alias,
    route,
    model: route.model,
    provider: route.provider,
    apiKey: resolveApiKey(route.apiKeyRef, env),
    apiBase: route.apiBase,
    stream: request.stream === true,
    timeout,
    numRetries,
    pricing: route.pricing,
    params,
  };
}

/** Remove a proxy-level control from the upstream params and return it. */
function takeNumber(params: Record<string, unknown>, key: string): number | undefined {
  const value = params[key];
  delete params[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * List every alias with its provider tag and per-million-token pricing.
 * Route overrides come first, then the catalog; unknown prices are null.
 */
export function listRoutes(table: RouteTable, client: Pick<ProviderClient, 'getModelPricing'>): RouteListing[] {
  return [...table.routes.values()].map((route) => {
    const catalog = client.getModelPricing(route.model);
    return {
      name: route.alias,
      model: route.model,
      provider: route.provider,
      enabled: route.enabled,
      input_cost_per_million:
        route.pricing?.inputCostPerMillion ?? (catalog ? perMillion(catalog.inputCostPerToken) : null),
      output_cost_per_million:
        route.pricing?.outputCostPerMillion ?? (catalog ? perMillion(catalog.outputCostPerToken) : null),
    };
  });
}

/** Ledger-safe view of a resolved request: no api key, no api base credentials. */
export function serializeResolved(resolved: ResolvedRequest): Record<string, unknown> {
  return {
    model: resolved.model,
    provider: resolved.provider,
    stream: resolved.stream,
    timeout: resolved.timeout,
    num_retries: resolved.numRetries,
    ...resolved.params,
  };
}
