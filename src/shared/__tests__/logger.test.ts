import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { logger, REDACT_PATHS } from '../logger.js';

function bufferedLogger() {
  const chunks: string[] = [];
  const dest = {
    write(chunk: string) {
      chunks.push(chunk);
    },
  };
  const testLogger = pino({ level: 'info', redact: { paths: REDACT_PATHS, censor: '[REDACTED]' } }, dest);
  return { chunks, testLogger };
}

describe('logger', () => {
  it('is a pino logger instance', () => {
    expect(logger).toBeDefined();
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.error).toBe('function');
    expect(typeof logger.warn).toBe('function');
    expect(typeof logger.debug).toBe('function');
  });

  it('redacts API key values from logged objects', () => {
    const { chunks, testLogger } = bufferedLogger();

    testLogger.info({ req: { headers: { authorization: 'Bearer test-secret-1' } } }, 'test request');
    testLogger.info({ route: { apiKey: 'test-secret-2' } }, 'test route');
    testLogger.info({ request: { api_key: 'test-secret-3' } }, 'test request body');
    testLogger.info({ apiKey: 'test-secret-4' }, 'top level');

    const lines = chunks.map((chunk) => JSON.parse(chunk));
    expect(lines[0].req.headers.authorization).toBe('[REDACTED]');
    expect(lines[1].route.apiKey).toBe('[REDACTED]');
    expect(lines[2].request.api_key).toBe('[REDACTED]');
    expect(lines[3].apiKey).toBe('[REDACTED]');
  });

  it('outputs structured JSON', () => {
    const { chunks, testLogger } = bufferedLogger();

    testLogger.info({ alias: 'gpt' }, 'test message');

    const parsed = JSON.parse(chunks[0]);
    expect(parsed.alias).toBe('gpt');
    expect(parsed.msg).toBe('test message');
    expect(parsed.level).toBe(30);
  });
});
