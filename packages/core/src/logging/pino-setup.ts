/**
 * Pino logger setup with automatic redaction of credential material
 *
 * Uses fast-redact (bundled with pino) for path-based redaction so bearer
 * tokens, authorization codes, client secrets and key material never reach
 * the log stream.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Paths censored on every log record.
 * @public
 */
export const REDACTED_PATHS: readonly string[] = [
  // OAuth2 grant material
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'id_token',
  '*.id_token',
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'code',
  '*.code',
  'state',
  '*.state',
  'token',
  '*.token',
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',

  // Verification key material
  'encryptionKey',
  '*.encryptionKey',
  'encryptionKeyString',
  '*.encryptionKeyString',

  // Generic sensitive patterns
  'password',
  '*.password',
  '*.secret',
  '*.key',
];

/**
 * Reads the level from REALM_CONNECT_LOG_LEVEL, falling back to 'silent'.
 * @internal
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): LevelWithSilent {
  const requested = (env.REALM_CONNECT_LOG_LEVEL ?? '').toLowerCase();
  const match = LOG_LEVELS.find((level) => level === requested);
  return match ?? 'silent';
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * Silent unless REALM_CONNECT_LOG_LEVEL is set. The level may also be changed
 * at runtime:
 *
 * @example
 * ```typescript
 * import { rootLogger } from '@realm-connect/core';
 *
 * rootLogger.level = 'debug';
 * rootLogger.info({ access_token: 'abc' }); // { access_token: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger: Logger = pino({
  name: 'realm-connect',
  level: resolveLogLevel(),
  redact: {
    paths: [...REDACTED_PATHS],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
