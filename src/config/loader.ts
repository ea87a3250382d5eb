/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema,
 * and returns a fully typed Config object or throws a ConfigError.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema, ENV_REF_PATTERN } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config, Settings } from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @param env - Environment used to warn about unset key references
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export function loadConfig(path: string, env: Env = process.env): Config {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Config file not found: ${path}. Run 'llm-tally --init' to create one, or pass --config <path>.`,
    );
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  for (const variable of findMissingEnvRefs(result.data, env)) {
    logger.warn(
      { variable },
      `Environment variable ${variable} not set. Requests using this model will fail with an authentication error.`,
    );
  }

  logger.info(
    { configPath: path, models: result.data.models.length },
    'Config loaded successfully',
  );

  return result.data;
}

/** Names of `env:` references in the config that the environment does not define. */
export function findMissingEnvRefs(config: Config, env: Env): string[] {
  const missing = new Set<string>();
  for (const model of config.models) {
    const name = model.apiKey ? ENV_REF_PATTERN.exec(model.apiKey)?.[1] : undefined;
    if (name && env[name] === undefined) {
      missing.add(name);
    }
  }
  return [...missing];
}

/**
 * Resolve the config file path from CLI args, env var, or default.
 *
 * Priority:
 * 1. --config CLI argument
 * 2. CONFIG_PATH environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(argv: readonly string[] = process.argv, env: Env = process.env): string {
  const configArgIndex = argv.indexOf('--config');
  const fromArgs = configArgIndex !== -1 ? argv[configArgIndex + 1] : undefined;
  if (fromArgs) {
    return fromArgs;
  }

  const envPath = env['CONFIG_PATH'];
  if (envPath) {
    return envPath;
  }

  return './config/config.yaml';
}

const EnvOverridesSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  HOST: z.string().min(1).optional(),
  DB_PATH: z.string().min(1).optional(),
  DEFAULT_TIMEOUT: z.coerce.number().int().positive().optional(),
  DEFAULT_RETRIES: z.coerce.number().int().nonnegative().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

/**
 * Apply environment overrides (set by the CLI flags or the shell) on top of
 * file settings. Returns a new object; the input is not modified.
 *
 * @throws ConfigError when an override is not a valid value
 */
export function applyEnvOverrides(settings: Settings, env: Env = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key in EnvOverridesSchema.shape && value !== undefined && value !== ''),
  );
  const result = EnvOverridesSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(`Invalid environment override:\n${z.prettifyError(result.error)}`);
  }

  const overrides = result.data;
  return {
    ...settings,
    port: overrides.PORT ?? settings.port,
    host: overrides.HOST ?? settings.host,
    dbPath: overrides.DB_PATH ?? settings.dbPath,
    defaultTimeout: overrides.DEFAULT_TIMEOUT ?? settings.defaultTimeout,
    defaultRetries: overrides.DEFAULT_RETRIES ?? settings.defaultRetries,
    logLevel: overrides.LOG_LEVEL ?? settings.logLevel,
  };
}
