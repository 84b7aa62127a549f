import type { OAuth2ErrorResponse, ProviderResponseBody } from '../oauth-types.js';

/**
 * Extracts an OAuth2 error from a parsed response body.
 *
 * Returns `undefined` when the body carries no non-empty string `error` field.
 * @public
 */
export function extractOAuth2Error(body: ProviderResponseBody): OAuth2ErrorResponse | undefined {
  if (typeof body === 'string') {
    return undefined;
  }

  const { error, error_description, error_uri } = body;
  if (typeof error !== 'string' || error.length === 0) {
    return undefined;
  }

  return {
    error,
    error_description: typeof error_description === 'string' ? error_description : undefined,
    error_uri: typeof error_uri === 'string' ? error_uri : undefined,
  };
}

/**
 * Builds an OAuth2 error for a failed HTTP response whose body has none.
 *
 * 5xx statuses map to 'server_error', everything else to 'invalid_request'.
 * @public
 */
export function fallbackErrorResponse(response: Response): OAuth2ErrorResponse {
  return {
    error: response.status >= 500 ? 'server_error' : 'invalid_request',
    error_description: `HTTP ${response.status}: ${response.statusText}`,
  };
}
