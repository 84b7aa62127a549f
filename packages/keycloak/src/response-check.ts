import {
  extractOAuth2Error,
  IdentityProviderError,
  type ProviderResponseBody,
  type ResponseCheck,
} from '@realm-connect/auth';
import { logEvent } from '@realm-connect/core';

/**
 * Rejects any token or userinfo response whose body carries a non-empty
 * `error`, whatever its HTTP status.
 * @throws {IdentityProviderError}
 * @public
 */
export const checkIdentityProviderResponse: ResponseCheck = (
  response: Response,
  body: ProviderResponseBody,
): void => {
  const error = extractOAuth2Error(body);
  if (!error || typeof body === 'string') {
    return;
  }

  logEvent('warn', 'keycloak:provider_error', {
    status: response.status,
    error: error.error,
  });
  throw new IdentityProviderError(error, body, response.status);
};
