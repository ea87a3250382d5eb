#!/usr/bin/env node
/**
 * CLI entry point for llm-tally.
 * Handles --help and --init, exports the remaining flags as environment
 * variables and delegates to the application bootstrap.
 */

import { fileURLToPath } from 'node:url';
import { cliEnv, HELP_TEXT, initConfigFile, parseCliArgs, type CliOptions } from './cli-options.js';

let options: CliOptions;
try {
  options = parseCliArgs(process.argv.slice(2));
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  console.error('Run llm-tally --help for usage.');
  process.exit(1);
}

if (options.help) {
  console.log(HELP_TEXT);
  process.exit(0);
}

if (options.init) {
  const examplePath = fileURLToPath(new URL('../config/config.example.yaml', import.meta.url));
  try {
    const targetPath = initConfigFile(process.cwd(), examplePath);
    console.log(`✓ Created config file: ${targetPath}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Add your models and set the API key environment variables they reference');
    console.log('  2. Run: llm-tally');
    console.log('');
    process.exit(0);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

Object.assign(process.env, cliEnv(options));

// Bootstrap the application
await import('./index.js');
