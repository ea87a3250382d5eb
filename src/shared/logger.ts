/**
 * Structured JSON logger with API key redaction.
 * Must be imported before any logging occurs to ensure secrets are never leaked.
 */

import pino from 'pino';

const logLevel = process.env['LOG_LEVEL'] ?? 'info';

/** Paths censored in every log line. */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers["api-key"]',
  '*.apiKey',
  '*.api_key',
  'apiKey',
  'api_key',
];

// Pretty output unless explicitly JSON, in production, or under the test runner
const usePretty =
  process.env['LOG_FORMAT'] === 'pretty' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.env['LOG_FORMAT'] !== 'json');

export const logger = pino({
  name: 'llm-tally',
  level: logLevel,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
  }),
});
