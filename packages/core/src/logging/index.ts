/**
 * Logging infrastructure exports
 *
 * Structured logging with automatic redaction via pino + fast-redact
 */

export { rootLogger, resolveLogLevel, REDACTED_PATHS } from './pino-setup.js';

export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
