import { createRequestId, logError, logEvent } from '@realm-connect/core';
import { ZodError } from 'zod';
import { AuthenticationError, AuthErrorCode } from '../errors/authentication-error.js';
import { AccessToken } from '../token/access-token.js';
import {
  OAuth2ClientOptionsSchema,
  type OAuth2ClientOptions,
  type OAuth2ClientOptionsInput,
} from '../schemas.js';
import type { GrantType, ProviderResponseBody, ResponseCheck } from '../utils/oauth-types.js';
import {
  appendQuery,
  buildQueryString,
  type AuthorizationUrlOptions,
  type QueryParams,
} from '../utils/auth-url.js';
import { generateState } from '../utils/pkce.js';
import { buildTokenRequestBody, buildTokenRequestHeaders } from '../utils/token-exchange.js';
import { createOAuth2Error } from '../utils/error/create-oauth2-error.js';
import { extractOAuth2Error, fallbackErrorResponse } from '../utils/error/parse-error-response.js';

/**
 * Collaborators a provider hands to the client.
 * @public
 */
export interface OAuth2ClientCollaborators {
  /** HTTP transport; defaults to the global fetch. Timeouts and cancellation belong here. */
  fetch?: typeof fetch;
  /** Provider-specific response check, run before the default status check */
  checkResponse?: ResponseCheck;
  /** Scopes requested when an authorization request names none */
  defaultScopes?: readonly string[];
}

/**
 * An authorization URL together with the state it carries.
 * @public
 */
export interface AuthorizationRequest {
  url: string;
  state: string;
}

/**
 * Generic OAuth2 client: authorization URL templating, grant exchange and
 * resource owner detail requests against caller-supplied endpoint URLs.
 *
 * Provider adapters compose it rather than subclass it; endpoint URLs and
 * the provider's response check come in from the outside.
 *
 * Every call is a single request. Nothing is retried and nothing is cached.
 *
 * @example
 * ```typescript
 * const client = new GenericOAuth2Client(
 *   { clientId: 'web', redirectUri: 'https://app.example.com/callback' },
 *   { defaultScopes: ['openid'] },
 * );
 *
 * const { url, state } = client.getAuthorizationUrl('https://idp.example.com/authorize');
 * // ...redirect, then on callback:
 * const token = await client.getAccessToken('https://idp.example.com/token', 'authorization_code', {
 *   code,
 * });
 * ```
 * @public
 */
export class GenericOAuth2Client {
  private readonly options: OAuth2ClientOptions;
  private readonly fetchFn: typeof fetch;
  private readonly providerCheck?: ResponseCheck;
  private readonly defaultScopes: readonly string[];

  /**
   * @throws {AuthenticationError} With code `configuration_error` when the options are invalid
   */
  public constructor(
    options: OAuth2ClientOptionsInput,
    collaborators: OAuth2ClientCollaborators = {},
  ) {
    this.options = parseOptions(options);
    this.fetchFn = collaborators.fetch ?? fetch;
    this.providerCheck = collaborators.checkResponse;
    this.defaultScopes = collaborators.defaultScopes ?? [];
  }

  public getClientId(): string {
    return this.options.clientId;
  }

  public getRedirectUri(): string | undefined {
    return this.options.redirectUri;
  }

  /**
   * Query parameters of an authorization request. A state is generated when
   * the caller supplies none.
   */
  public getAuthorizationParameters(options: AuthorizationUrlOptions = {}): {
    params: QueryParams;
    state: string;
  } {
    const state = options.state ?? generateState();
    const scope = options.scope ?? this.defaultScopes;

    const params: QueryParams = {
      ...options.extraParams,
      state,
      scope: scope.length > 0 ? scope : undefined,
      response_type: 'code',
      client_id: this.options.clientId,
      redirect_uri: options.redirectUri ?? this.options.redirectUri,
    };

    return { params, state };
  }

  /**
   * Builds the URL the user agent is redirected to for authorization.
   * @param baseUrl - The provider's authorization endpoint
   */
  public getAuthorizationUrl(
    baseUrl: string,
    options: AuthorizationUrlOptions = {},
  ): AuthorizationRequest {
    const { params, state } = this.getAuthorizationParameters(options);
    const url = appendQuery(baseUrl, buildQueryString(params, this.options.scopeSeparator));
    return { url, state };
  }

  /**
   * Exchanges a grant for an access token.
   * @param tokenUrl - The provider's token endpoint
   * @param grant - Grant type
   * @param params - Grant parameters, e.g. `{ code }` or `{ refresh_token }`
   * @throws {AuthenticationError} On transport failure, a rejected response, or a body without access_token
   */
  public async getAccessToken(
    tokenUrl: string,
    grant: GrantType,
    params: Record<string, string>,
  ): Promise<AccessToken> {
    const requestId = createRequestId('token');
    logEvent('debug', 'auth:token_request', { requestId, grant, tokenUrl });

    const body = await this.send(requestId, tokenUrl, {
      method: 'POST',
      headers: buildTokenRequestHeaders(this.options),
      body: buildTokenRequestBody(this.options, grant, params).toString(),
    });

    if (typeof body === 'string') {
      throw new AuthenticationError(
        'Token endpoint returned a non-JSON response',
        AuthErrorCode.UNKNOWN_ERROR,
      );
    }

    const token = new AccessToken(body);
    logEvent('info', 'auth:token_acquired', {
      requestId,
      grant,
      expires: token.getExpires(),
    });
    return token;
  }

  /**
   * Requests the resource owner's details with the token as bearer
   * credential. Returns the JSON object, or the raw body when the provider
   * answers with something else such as `application/jwt`.
   * @param url - The provider's userinfo endpoint
   */
  public async getResourceOwnerDetails(
    url: string,
    token: AccessToken,
  ): Promise<ProviderResponseBody> {
    const requestId = createRequestId('userinfo');
    logEvent('debug', 'auth:resource_owner_request', { requestId, url });

    return this.send(requestId, url, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${token.getToken()}`,
        Accept: 'application/json, application/jwt',
      },
    });
  }

  /**
   * Sends a request, parses the body and runs the response checks.
   */
  private async send(
    requestId: string,
    url: string,
    init: RequestInit,
  ): Promise<ProviderResponseBody> {
    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (error) {
      logError('auth:network', error, { requestId, url, method: init.method });
      throw AuthenticationError.networkError(
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    const body = await parseResponseBody(response);
    this.checkResponse(requestId, response, body);
    return body;
  }

  private checkResponse(
    requestId: string,
    response: Response,
    body: ProviderResponseBody,
  ): void {
    this.providerCheck?.(response, body);

    if (!response.ok) {
      const errorResponse = extractOAuth2Error(body) ?? fallbackErrorResponse(response);
      logEvent('warn', 'auth:request_failed', {
        requestId,
        status: response.status,
        error: errorResponse.error,
      });
      throw createOAuth2Error(errorResponse, response.status);
    }
  }
}

function parseOptions(options: OAuth2ClientOptionsInput): OAuth2ClientOptions {
  try {
    return OAuth2ClientOptionsSchema.parse(options);
  } catch (error) {
    if (error instanceof ZodError) {
      throw AuthenticationError.invalidConfiguration(
        error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        error,
      );
    }
    throw error;
  }
}

/**
 * Parses a provider response by content type: JSON objects, form-encoded
 * bodies, and anything else as trimmed text.
 * @throws {AuthenticationError} When a JSON body is malformed or not an object
 * @internal
 */
export async function parseResponseBody(response: Response): Promise<ProviderResponseBody> {
  const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
  const text = await response.text();

  if (contentType.includes('json')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new AuthenticationError(
        'Failed to parse OAuth2 response: invalid JSON',
        AuthErrorCode.UNKNOWN_ERROR,
        error instanceof Error ? error : undefined,
      );
    }
    if (!isRecord(parsed)) {
      throw new AuthenticationError(
        'Failed to parse OAuth2 response: expected a JSON object',
        AuthErrorCode.UNKNOWN_ERROR,
      );
    }
    return parsed;
  }

  if (contentType.includes('application/x-www-form-urlencoded')) {
    return Object.fromEntries(new URLSearchParams(text));
  }

  return text.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
