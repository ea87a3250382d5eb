/**
 * TypeScript types inferred from Zod schemas.
 */

import type { z } from 'zod';
import type { ConfigSchema, ModelSchema, SettingsSchema } from './schema.js';

/** Fully validated proxy configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** A single model alias as written in config. */
export type ModelConfig = z.infer<typeof ModelSchema>;

/** Proxy-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;
