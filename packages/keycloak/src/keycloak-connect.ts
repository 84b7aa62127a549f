import {
  AccessToken,
  AuthenticationError,
  GenericOAuth2Client,
  type AuthorizationRequest,
  type AuthorizationUrlOptions,
  type QueryParams,
} from '@realm-connect/auth';
import { logEvent, type EnvVarPatternResolverConfig } from '@realm-connect/core';
import { ZodError } from 'zod';
import { resolveKeycloakConfig } from './config.js';
import { RealmEndpoints } from './endpoints/realm-endpoints.js';
import { EncryptionConfigurationError } from './errors/encryption-configuration-error.js';
import {
  createResourceOwner,
  type KeycloakResourceOwner,
} from './resource-owner/keycloak-resource-owner.js';
import { checkIdentityProviderResponse } from './response-check.js';
import {
  KeycloakConnectConfigSchema,
  type KeycloakConnectConfig,
  type KeycloakConnectConfigInput,
} from './schemas.js';
import { ResponseVerifier } from './verification/response-verifier.js';
import type { ClaimsMap, VerifiedClaims } from './verification/types.js';

const DEFAULT_SCOPES: readonly string[] = ['name', 'email'];

/**
 * Collaborators of the provider.
 * @public
 */
export interface KeycloakConnectCollaborators {
  /** HTTP transport handed to the OAuth2 client; defaults to the global fetch */
  fetch?: typeof fetch;
}

/**
 * OpenID Connect provider for a Keycloak realm.
 *
 * Composes a {@link GenericOAuth2Client} for grant exchange and authorization
 * URLs, {@link RealmEndpoints} for URL construction, and a
 * {@link ResponseVerifier} for signed resource owner responses.
 *
 * @example
 * ```typescript
 * const provider = new KeycloakConnect({
 *   authServerUrl: 'https://idp.example.com',
 *   realm: 'demo',
 *   clientId: 'web',
 *   clientSecret: 'test-secret',
 *   redirectUri: 'https://app.example.com/callback',
 *   encryptionAlgorithm: 'RS256',
 *   encryptionKeyString: realmPublicKey,
 * });
 *
 * const { url, state } = provider.getAuthorizationUrl();
 * // ...redirect, compare state on callback, then:
 * const token = await provider.authByCode(code);
 * const owner = await provider.getResourceOwner(token);
 * owner.getEmail();
 * ```
 * @public
 */
export class KeycloakConnect {
  public static readonly AUTHORIZATION_CODE = 'authorization_code';
  public static readonly REFRESH_TOKEN = 'refresh_token';

  private readonly config: KeycloakConnectConfig;
  private readonly endpoints: RealmEndpoints;
  private readonly verifier: ResponseVerifier;
  private readonly client: GenericOAuth2Client;

  /**
   * @throws {EncryptionConfigurationError} When only one of algorithm and key is configured
   * @throws {AuthenticationError} With code `configuration_error` for any other invalid setting
   */
  public constructor(
    config: KeycloakConnectConfigInput,
    collaborators: KeycloakConnectCollaborators = {},
  ) {
    this.config = parseConfig(config);
    assertEncryptionConfiguration(this.config);

    this.endpoints = new RealmEndpoints({
      authServerUrl: this.config.authServerUrl,
      realm: this.config.realm,
    });
    this.verifier = new ResponseVerifier({
      encryptionAlgorithm: this.config.encryptionAlgorithm,
      encryptionKey: this.config.encryptionKey,
    });
    this.client = new GenericOAuth2Client(
      {
        clientId: this.config.clientId,
        clientSecret: this.config.clientSecret,
        redirectUri: this.config.redirectUri,
      },
      {
        fetch: collaborators.fetch,
        checkResponse: checkIdentityProviderResponse,
        defaultScopes: this.config.scopes ?? this.getDefaultScopes(),
      },
    );

    logEvent('debug', 'keycloak:provider_created', {
      realm: this.config.realm,
      authServerUrl: this.config.authServerUrl,
      usesEncryption: this.usesEncryption(),
    });
  }

  public getBaseAuthorizationUrl(): string {
    return this.endpoints.getBaseAuthorizationUrl();
  }

  public getBaseAccessTokenUrl(): string {
    return this.endpoints.getBaseAccessTokenUrl();
  }

  public getResourceOwnerDetailsUrl(): string {
    return this.endpoints.getResourceOwnerDetailsUrl();
  }

  /**
   * Logout URL with the caller's parameters, e.g.
   * `{ post_logout_redirect_uri, id_token_hint }`.
   */
  public getLogoutUrl(params: QueryParams = {}): string {
    return this.endpoints.getLogoutUrl(params);
  }

  /**
   * Authorization URL on the configured server. Keep the returned state and
   * compare it with the one on the callback.
   */
  public getAuthorizationUrl(options: AuthorizationUrlOptions = {}): AuthorizationRequest {
    return this.client.getAuthorizationUrl(this.getBaseAuthorizationUrl(), options);
  }

  /**
   * Authorization URL on another server base, same realm and parameters.
   * Used when the browser reaches the provider under a different host than
   * the backend, as with docker networks.
   */
  public getAuthorizationUrlDocker(
    baseUrl: string,
    options: AuthorizationUrlOptions = {},
  ): AuthorizationRequest {
    return this.client.getAuthorizationUrl(this.endpoints.getAuthorizationUrlOn(baseUrl), options);
  }

  /** Scopes requested when none are configured or passed. */
  public getDefaultScopes(): readonly string[] {
    return DEFAULT_SCOPES;
  }

  /**
   * @throws {IdentityProviderError} When the provider answers with an error payload
   */
  public async authByCode(code: string): Promise<AccessToken> {
    return this.client.getAccessToken(
      this.getBaseAccessTokenUrl(),
      KeycloakConnect.AUTHORIZATION_CODE,
      { code },
    );
  }

  /**
   * @throws {IdentityProviderError} When the provider answers with an error payload
   */
  public async authByRefreshToken(refreshToken: string): Promise<AccessToken> {
    return this.client.getAccessToken(
      this.getBaseAccessTokenUrl(),
      KeycloakConnect.REFRESH_TOKEN,
      { refresh_token: refreshToken },
    );
  }

  /**
   * Resolves the resource owner from the access token itself, which Keycloak
   * issues as a signed JWT. No request is made.
   * @throws {EncryptionConfigurationError} When no algorithm and key are configured
   * @throws {SignatureVerificationError} When the token does not verify
   */
  public async getResourceOwner(token: AccessToken): Promise<KeycloakResourceOwner> {
    const claims = await this.decryptResponse(token.getToken());
    return createResourceOwner(claims);
  }

  /**
   * Resolves the resource owner through the userinfo endpoint. JSON answers
   * are used as they are; signed (`application/jwt`) answers are verified.
   * @throws {IdentityProviderError} When the provider answers with an error payload
   * @throws {SignatureVerificationError} When a signed answer does not verify
   */
  public async fetchResourceOwner(token: AccessToken): Promise<KeycloakResourceOwner> {
    const details = await this.client.getResourceOwnerDetails(
      this.getResourceOwnerDetailsUrl(),
      token,
    );
    const claims = await this.decryptResponse(details);
    return createResourceOwner(claims);
  }

  /**
   * Verifies and decodes an encoded response; structured responses pass
   * through unchanged.
   */
  public async decryptResponse(response: string | ClaimsMap): Promise<VerifiedClaims> {
    return this.verifier.resolve(response);
  }

  public usesEncryption(): boolean {
    return this.verifier.usesEncryption();
  }
}

/**
 * Options of {@link createKeycloakConnect}.
 * @public
 */
export interface CreateKeycloakConnectOptions extends KeycloakConnectCollaborators {
  /** Settings for `${VAR}` resolution, e.g. a custom envSource */
  env?: EnvVarPatternResolverConfig;
}

/**
 * Resolves environment references in the configuration, then constructs the
 * provider.
 * @public
 */
export function createKeycloakConnect(
  config: KeycloakConnectConfigInput,
  options: CreateKeycloakConnectOptions = {},
): KeycloakConnect {
  const { env, ...collaborators } = options;
  return new KeycloakConnect(resolveKeycloakConfig(config, env), collaborators);
}

function parseConfig(config: KeycloakConnectConfigInput): KeycloakConnectConfig {
  try {
    return KeycloakConnectConfigSchema.parse(config);
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

function assertEncryptionConfiguration(config: KeycloakConnectConfig): void {
  if (config.encryptionAlgorithm && !config.encryptionKey) {
    throw EncryptionConfigurationError.partialConfiguration('encryptionKey');
  }
  if (config.encryptionKey && !config.encryptionAlgorithm) {
    throw EncryptionConfigurationError.partialConfiguration('encryptionAlgorithm');
  }
}
