/**
 * Verifies that credential material is redacted via the shared path list
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { pino, type Logger } from 'pino';
import { REDACTED_PATHS, resolveLogLevel } from '../../logging/pino-setup.js';

describe('Pino Redaction', () => {
  let testLogger: Logger;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    testLogger = pino(
      {
        redact: {
          paths: [...REDACTED_PATHS],
          censor: '[REDACTED]',
          remove: false,
        },
      },
      {
        write: (msg: string) => {
          logs.push(msg);
        },
      },
    );
  });

  it('redacts access_token', () => {
    testLogger.info({ access_token: 'test-access-token' });

    const logged = JSON.parse(logs[0]);
    expect(logged.access_token).toBe('[REDACTED]');
  });

  it('redacts nested refresh_token and keeps siblings', () => {
    testLogger.info({ data: { refresh_token: 'test-refresh', expires_in: 300 } });

    const logged = JSON.parse(logs[0]);
    expect(logged.data.refresh_token).toBe('[REDACTED]');
    expect(logged.data.expires_in).toBe(300);
  });

  it('redacts authorization codes', () => {
    testLogger.info({ data: { code: 'test-code', grantType: 'authorization_code' } });

    const logged = JSON.parse(logs[0]);
    expect(logged.data.code).toBe('[REDACTED]');
    expect(logged.data.grantType).toBe('authorization_code');
  });

  it('redacts client secrets in both spellings', () => {
    testLogger.info({ client_secret: 'test-secret', clientSecret: 'test-secret' });

    const logged = JSON.parse(logs[0]);
    expect(logged.client_secret).toBe('[REDACTED]');
    expect(logged.clientSecret).toBe('[REDACTED]');
  });

  it('redacts verification key material', () => {
    testLogger.info({ config: { encryptionKey: 'test-key', realm: 'demo' } });

    const logged = JSON.parse(logs[0]);
    expect(logged.config.encryptionKey).toBe('[REDACTED]');
    expect(logged.config.realm).toBe('demo');
  });
});

describe('resolveLogLevel', () => {
  it('defaults to silent', () => {
    expect(resolveLogLevel({})).toBe('silent');
  });

  it('accepts a known level case-insensitively', () => {
    expect(resolveLogLevel({ REALM_CONNECT_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('ignores unknown levels', () => {
    expect(resolveLogLevel({ REALM_CONNECT_LOG_LEVEL: 'verbose' })).toBe('silent');
  });
});
