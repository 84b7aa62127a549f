/**
 * Token endpoint request construction
 * Pure functions, no I/O
 */
import type { GrantType } from './oauth-types.js';

export interface TokenRequestCredentials {
  clientId: string;
  clientSecret?: string;
  redirectUri?: string;
}

/**
 * Build the URL-encoded body of a token request.
 *
 * Always carries `grant_type` and `client_id`; the client secret is sent in
 * the Authorization header instead (see {@link buildTokenRequestHeaders}).
 * `redirect_uri` is added to authorization_code grants when configured.
 * @param credentials - Client credentials and redirect URI
 * @param grant - Grant type to request
 * @param params - Grant-specific parameters such as `code` or `refresh_token`
 * @public
 */
export function buildTokenRequestBody(
  credentials: TokenRequestCredentials,
  grant: GrantType,
  params: Record<string, string>,
): URLSearchParams {
  const body = new URLSearchParams({
    grant_type: grant,
    client_id: credentials.clientId,
  });

  if (grant === 'authorization_code' && credentials.redirectUri) {
    body.set('redirect_uri', credentials.redirectUri);
  }

  for (const [key, value] of Object.entries(params)) {
    body.set(key, value);
  }

  return body;
}

/**
 * Build token request headers, with HTTP Basic client authentication when a
 * client secret is configured.
 * @public
 */
export function buildTokenRequestHeaders(
  credentials: TokenRequestCredentials,
): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/x-www-form-urlencoded',
    Accept: 'application/json',
  };

  if (credentials.clientSecret) {
    headers.Authorization = buildBasicAuthorization(credentials.clientId, credentials.clientSecret);
  }

  return headers;
}

/**
 * `Basic base64(client_id:client_secret)`, with both parts form-encoded per
 * RFC 6749 section 2.3.1.
 * @public
 */
export function buildBasicAuthorization(clientId: string, clientSecret: string): string {
  const encode = (value: string): string =>
    encodeURIComponent(value).replace(/%20/g, '+');
  const credentials = Buffer.from(`${encode(clientId)}:${encode(clientSecret)}`).toString('base64');
  return `Basic ${credentials}`;
}
