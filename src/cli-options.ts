/**
 * Command-line parsing for the llm-tally binary.
 * Options are handed to the bootstrap as environment variables, so the
 * config loader sees one source of overrides whether they came from flags
 * or from the environment.
 */

import { parseArgs } from 'node:util';
import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export const HELP_TEXT = `
llm-tally - OpenAI-compatible chat completion proxy with a usage ledger

Usage:
  llm-tally [options]

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -p, --port <port>     Port to listen on (overrides config)
  --host <host>         Interface to bind (overrides config)
  --db <path>           SQLite ledger path (overrides config)
  --timeout <seconds>   Default upstream timeout (overrides config)
  --retries <count>     Default retry count (overrides config)
  --init                Create config/config.yaml from the bundled example
  -h, --help            Show this help message

Examples:
  llm-tally                                  # Run with default config
  llm-tally --config /etc/llm-tally.yaml     # Run with custom config path
  llm-tally --init                           # Create config/config.yaml from example
`;

export interface CliOptions {
  config?: string;
  port?: string;
  host?: string;
  db?: string;
  timeout?: string;
  retries?: string;
  init: boolean;
  help: boolean;
}

/**
 * Parse argv (without the node and script entries).
 * @throws TypeError for unknown flags or missing values
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...args],
    options: {
      config: { type: 'string', short: 'c' },
      port: { type: 'string', short: 'p' },
      host: { type: 'string' },
      db: { type: 'string' },
      timeout: { type: 'string' },
      retries: { type: 'string' },
      init: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  return {
    config: values.config,
    port: values.port,
    host: values.host,
    db: values.db,
    timeout: values.timeout,
    retries: values.retries,
    init: values.init === true,
    help: values.help === true,
  };
}

/** Environment variables the bootstrap reads, for the flags that were given. */
export function cliEnv(options: CliOptions): Record<string, string> {
  const env: Record<string, string> = {};
  if (options.config) env['CONFIG_PATH'] = options.config;
  if (options.port) env['PORT'] = options.port;
  if (options.host) env['HOST'] = options.host;
  if (options.db) env['DB_PATH'] = options.db;
  if (options.timeout) env['DEFAULT_TIMEOUT'] = options.timeout;
  if (options.retries) env['DEFAULT_RETRIES'] = options.retries;
  return env;
}

/**
 * Copy the example config to `<cwd>/config/config.yaml`.
 * @returns The path written.
 * @throws Error when the target exists or the example is missing
 */
export function initConfigFile(cwd: string, examplePath: string): string {
  const targetPath = resolve(cwd, 'config', 'config.yaml');

  if (existsSync(targetPath)) {
    throw new Error(`Config file already exists at ${targetPath}`);
  }
  if (!existsSync(examplePath)) {
    throw new Error('Example config not found (package may be corrupted)');
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(examplePath, targetPath);
  return targetPath;
}
