import { appendQuery, buildQueryString, type QueryParams } from '@realm-connect/auth';

const OPENID_CONNECT_PATH = '/protocol/openid-connect';

/**
 * Location of a realm on a Keycloak server.
 * @public
 */
export interface RealmLocation {
  /** Server base URL, e.g. `https://idp.example.com` or `http://localhost:8080/auth` */
  authServerUrl: string;
  realm: string;
}

export type OpenIdConnectEndpoint = 'auth' | 'token' | 'userinfo' | 'logout';

/**
 * Builds a realm's OpenID Connect endpoint URL on an arbitrary server base.
 *
 * No validation: a malformed base yields a malformed URL.
 * @public
 */
export function buildRealmEndpointUrl(
  authServerUrl: string,
  realm: string,
  endpoint: OpenIdConnectEndpoint,
): string {
  return `${authServerUrl}/realms/${realm}${OPENID_CONNECT_PATH}/${endpoint}`;
}

/**
 * Endpoint URLs of one realm.
 * @public
 */
export class RealmEndpoints {
  public constructor(private readonly location: RealmLocation) {}

  public getIdentityProviderBaseUrl(): string {
    return `${this.location.authServerUrl}/realms/${this.location.realm}`;
  }

  public getBaseAuthorizationUrl(): string {
    return this.resolve('auth');
  }

  public getBaseAccessTokenUrl(): string {
    return this.resolve('token');
  }

  public getResourceOwnerDetailsUrl(): string {
    return this.resolve('userinfo');
  }

  public getBaseLogoutUrl(): string {
    return this.resolve('logout');
  }

  /**
   * Logout URL carrying exactly the caller's parameters, e.g.
   * `post_logout_redirect_uri` and `id_token_hint`.
   */
  public getLogoutUrl(params: QueryParams = {}): string {
    return appendQuery(this.getBaseLogoutUrl(), buildQueryString(params));
  }

  /**
   * Authorization endpoint of this realm on another server base, for clients
   * that reach the provider under a different host than the browser does.
   */
  public getAuthorizationUrlOn(baseUrl: string): string {
    return buildRealmEndpointUrl(baseUrl, this.location.realm, 'auth');
  }

  private resolve(endpoint: OpenIdConnectEndpoint): string {
    return buildRealmEndpointUrl(this.location.authServerUrl, this.location.realm, endpoint);
  }
}
