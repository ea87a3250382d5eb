/**
 * Route table types: what an alias resolves to.
 */

import type { PricingOverride } from '../providers/types.js';

/** One configured alias, frozen once built. */
export interface ModelRoute {
  readonly alias: string;
  /** Provider model id, e.g. `openai/gpt-4.1-mini`. */
  readonly model: string;
  /** Tag inferred from `model`, or `custom` when only apiBase identifies the endpoint. */
  readonly provider: string;
  /** `env:NAME` / `os.environ/NAME` reference or a literal key. */
  readonly apiKeyRef?: string;
  readonly apiBase?: string;
  readonly enabled: boolean;
  readonly pricing?: Readonly<PricingOverride>;
  /** Wire-keyed defaults merged into requests that do not set them. */
  readonly params: Readonly<Record<string, unknown>>;
}

/** Immutable snapshot of every configured alias. */
export interface RouteTable {
  readonly routes: ReadonlyMap<string, ModelRoute>;
  /** Enabled aliases, sorted. */
  readonly enabledAliases: readonly string[];
}

/** Fallbacks applied after the route merge. */
export interface RouteDefaults {
  /** Seconds. */
  timeout: number;
  numRetries: number;
}

/** Per-request working structure produced by resolution. */
export interface ResolvedRequest {
  alias: string;
  route: ModelRoute;
  /** Provider model id sent to the provider client. */
  model: string;
  provider: string;
  apiKey?: string;
  apiBase?: string;
  stream: boolean;
  /** Seconds. */
  timeout: number;
  numRetries: number;
  pricing?: PricingOverride;
  /** Messages and every pass-through parameter, in wire keys. */
  params: Record<string, unknown>;
}

/** One row of the pricing listing. */
export interface RouteListing {
  name: string;
  model: string;
  provider: string;
  enabled: boolean;
  input_cost_per_million: number | null;
  output_cost_per_million: number | null;
}
