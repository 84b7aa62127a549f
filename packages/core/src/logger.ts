import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the root pino logger.
 *
 * The event name goes into the `event` field and the payload into `data`,
 * so redaction paths such as `*.access_token` apply to it.
 * @param level - Log severity level
 * @param event - Event identifier for categorization, e.g. `keycloak:grant_requested`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  rootLogger[level]({ event, data }, event);
}

/**
 * Logs an error event with its message, name and stack.
 * @param context - Contextual label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context to aid debugging
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const err =
    rawError instanceof Error ? rawError : new Error(String(rawError));
  rootLogger.error(
    { event: `error:${context}`, err, data: extra },
    `error:${context}`,
  );
}
