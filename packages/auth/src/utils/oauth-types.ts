/**
 * OAuth2 core types following RFC 6749.
 *
 * @public
 */

/**
 * Grant types the client can exchange at a token endpoint.
 * @public
 */
export type GrantType = 'authorization_code' | 'refresh_token';

/**
 * OAuth2 token response following RFC 6749 section 5.1, plus the fields
 * OpenID Connect providers commonly add.
 * @public
 */
export interface OAuth2TokenResponse {
  /** The access token issued by the authorization server */
  access_token: string;
  /** Type of token issued (typically 'Bearer') */
  token_type?: string;
  /** Lifetime in seconds of the access token */
  expires_in?: number;
  /** Absolute expiry as epoch seconds, sent by some providers instead of expires_in */
  expires?: number;
  /** Refresh token for obtaining new access tokens */
  refresh_token?: string;
  /** OpenID Connect ID token */
  id_token?: string;
  /** Space-delimited list of granted scopes */
  scope?: string;
  [key: string]: unknown;
}

/**
 * OAuth2 error response following RFC 6749 section 5.2.
 * @public
 */
export interface OAuth2ErrorResponse {
  /** Error code, e.g. 'invalid_grant' */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** URI to documentation about the error */
  error_uri?: string;
}

/**
 * Parsed body of a token or userinfo endpoint: a JSON object, or the raw
 * text of a non-JSON body such as an `application/jwt` userinfo response.
 * @public
 */
export type ProviderResponseBody = string | Record<string, unknown>;

/**
 * Hook run on every token-endpoint and userinfo-endpoint response before the
 * body is processed further. Throws to reject the response.
 * @public
 */
export type ResponseCheck = (response: Response, body: ProviderResponseBody) => void;
