/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';
import { inferProviderFromModel } from '../providers/infer.js';
import { knownProviders } from '../providers/registry.js';

/** `env:NAME` or `os.environ/NAME`: the secret is read from the environment per request. */
export const ENV_REF_PATTERN = /^(?:env:|os\.environ\/)([A-Za-z_][A-Za-z0-9_]*)$/;

/** Schema for one model alias. */
export const ModelSchema = z.object({
  alias: z.string().min(1, { message: 'Model alias must not be empty' }),
  model: z.string().min(1, { message: 'Model id must not be empty' }),
  apiKey: z.string().min(1, { message: 'Model apiKey must not be empty' }).optional(),
  apiBase: z.url({ message: 'Model apiBase must be a valid URL' }).optional(),
  enabled: z.boolean().default(true),
  timeout: z.number().int().positive({ message: 'Timeout must be positive' }).optional(),
  numRetries: z.number().int().nonnegative({ message: 'Retries must be non-negative' }).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  inputCostPerMillion: z.number().nonnegative().optional(),
  outputCostPerMillion: z.number().nonnegative().optional(),
  params: z.record(z.string(), z.unknown()).default({}),
});

/** Schema for proxy settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(4000),
  host: z.string().min(1).default('0.0.0.0'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  dbPath: z.string().min(1).default('./data/requests.db'),
  /** Seconds. */
  defaultTimeout: z.number().int().positive().default(120),
  defaultRetries: z.number().int().nonnegative().default(3),
  drainOnDisconnect: z.boolean().default(true),
});

/** Top-level config schema with cross-entry validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema.prefault({}),
    models: z.array(ModelSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    const routable = new Set(knownProviders());

    config.models.forEach((model, index) => {
      if (seen.has(model.alias)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate model alias '${model.alias}'`,
          path: ['models', index, 'alias'],
        });
      }
      seen.add(model.alias);

      if (!model.apiBase && !routable.has(inferProviderFromModel(model.model))) {
        ctx.addIssue({
          code: 'custom',
          message:
            `Model '${model.model}' has no recognized provider; ` +
            `prefix it with one of ${[...routable].join(', ')} or set apiBase`,
          path: ['models', index, 'model'],
        });
      }
    });
  });
