/**
 * Static model pricing catalog.
 * Prices live in data/model-prices.json as USD per token, keyed by model id
 * with or without a provider prefix.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CostableResponse, ModelPricing, PricingOverride } from './types.js';

const DEFAULT_CATALOG_URL = new URL('../../data/model-prices.json', import.meta.url);

const PriceEntrySchema = z.object({
  provider: z.string().optional(),
  input_cost_per_token: z.number().nonnegative(),
  output_cost_per_token: z.number().nonnegative(),
});

const CatalogSchema = z.record(z.string(), PriceEntrySchema);

export type PriceCatalog = ReadonlyMap<string, ModelPricing>;

/** Parse a catalog document (already JSON-decoded). */
export function parseCatalog(raw: unknown): PriceCatalog {
  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid pricing catalog:\n${z.prettifyError(result.error)}`);
  }

  const catalog = new Map<string, ModelPricing>();
  for (const [model, entry] of Object.entries(result.data)) {
    catalog.set(model, {
      inputCostPerToken: entry.input_cost_per_token,
      outputCostPerToken: entry.output_cost_per_token,
      provider: entry.provider,
    });
  }
  return catalog;
}

/** Read and parse the bundled catalog file. */
export function loadCatalog(url: URL = DEFAULT_CATALOG_URL): PriceCatalog {
  return parseCatalog(JSON.parse(readFileSync(url, 'utf-8')));
}

/**
 * Find pricing for a model id: the full id first, then with leading
 * `provider/` segments removed one at a time.
 */
export function lookupPricing(catalog: PriceCatalog, model: string): ModelPricing | null {
  let candidate = model;
  for (;;) {
    const hit = catalog.get(candidate);
    if (hit) {
      return hit;
    }
    const slash = candidate.indexOf('/');
    if (slash < 0) {
      return null;
    }
    candidate = candidate.slice(slash + 1);
  }
}

/**
 * Estimate the USD cost of a response.
 * Route overrides (per million tokens) take precedence over the catalog.
 * A response without a usage block costs nothing.
 *
 * @throws Error when neither the override nor the catalog prices the model.
 */
export function estimateCost(
  catalog: PriceCatalog,
  response: CostableResponse,
  override?: PricingOverride,
): number {
  const usage = response.usage;
  if (!usage) {
    return 0;
  }

  const catalogPricing = lookupPricing(catalog, response.model);
  const inputPerToken =
    override?.inputCostPerMillion !== undefined
      ? override.inputCostPerMillion / 1_000_000
      : catalogPricing?.inputCostPerToken;
  const outputPerToken =
    override?.outputCostPerMillion !== undefined
      ? override.outputCostPerMillion / 1_000_000
      : catalogPricing?.outputCostPerToken;

  if (inputPerToken === undefined || outputPerToken === undefined) {
    throw new Error(`This model isn't mapped yet. model=${response.model}`);
  }

  return (usage.prompt_tokens ?? 0) * inputPerToken + (usage.completion_tokens ?? 0) * outputPerToken;
}

/** Convert per-token pricing to per-million, rounded to cents. */
export function perMillion(costPerToken: number): number {
  return Math.round(costPerToken * 1_000_000 * 100) / 100;
}
