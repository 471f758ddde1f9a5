import { Writable } from 'node:stream';

import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { createLogger, REDACT_PATHS } from './logger.js';

function createSink(lines: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
}

describe('createLogger', () => {
  it('creates logger with service/env bindings', () => {
    const logger = createLogger({ service: 'api', env: 'test', level: 'debug' });

    expect(logger.level).toBe('debug');
    expect(logger.bindings()).toMatchObject({ service: 'api', env: 'test' });
  });

  it('defaults to info level', () => {
    const logger = createLogger({ service: 'api', env: 'test' });

    expect(logger.level).toBe('info');
  });

  it('censors recipient addresses and tokens', () => {
    const lines: string[] = [];
    const logger = createLogger({ service: 'api', env: 'test', destination: createSink(lines) });

    logger.info({ outreach: { recipientEmail: 'dana@acme.test', token: 'test-secret' } }, 'sending');

    const entry = JSON.parse(lines[0] ?? '{}') as { outreach: Record<string, string> };
    expect(entry.outreach).toEqual({ recipientEmail: '[REDACTED]', token: '[REDACTED]' });
  });

  it('redacts top-level api keys with the shared path list', () => {
    const lines: string[] = [];
    const logger = pino({ redact: { paths: REDACT_PATHS, censor: '[REDACTED]' } }, createSink(lines));

    logger.warn({ apiKey: 'test-secret', provider: 'resend' }, 'provider failed');

    const entry = JSON.parse(lines[0] ?? '{}') as { apiKey: string; provider: string };
    expect(entry.apiKey).toBe('[REDACTED]');
    expect(entry.provider).toBe('resend');
  });
});
