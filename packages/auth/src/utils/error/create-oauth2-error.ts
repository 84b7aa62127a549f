import {
  AuthenticationError,
  OAuth2ErrorCode,
  AuthErrorCode,
  type ErrorCode,
} from '../../errors/authentication-error.js';
import type { OAuth2ErrorResponse } from '../oauth-types.js';

/**
 * Maps a provider error string onto the RFC 6749 codes.
 *
 * Unknown codes become `server_error` for 5xx statuses and `unknown_error`
 * otherwise.
 * @param error - The `error` field of the provider response
 * @param statusCode - HTTP status of the response, when known
 * @public
 */
export function mapOAuth2ErrorCode(error: string, statusCode?: number): ErrorCode {
  const known = Object.values(OAuth2ErrorCode).find((code) => code === error);
  if (known) {
    return known;
  }
  return statusCode !== undefined && statusCode >= 500
    ? OAuth2ErrorCode.SERVER_ERROR
    : AuthErrorCode.UNKNOWN_ERROR;
}

/**
 * Creates an AuthenticationError from an OAuth2 error response of a failed
 * HTTP request.
 * @example
 * ```typescript
 * const error = createOAuth2Error({ error: 'invalid_client' }, 401);
 * // error.code === OAuth2ErrorCode.INVALID_CLIENT
 * // error.message === 'OAuth2 authentication failed: invalid_client'
 * ```
 * @public
 */
export function createOAuth2Error(
  errorResponse: OAuth2ErrorResponse,
  statusCode: number,
): AuthenticationError {
  const message = errorResponse.error_description
    ? `OAuth2 authentication failed: ${errorResponse.error} - ${errorResponse.error_description}`
    : `OAuth2 authentication failed: ${errorResponse.error}`;

  return new AuthenticationError(message, mapOAuth2ErrorCode(errorResponse.error, statusCode));
}
