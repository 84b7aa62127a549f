import { AuthenticationError } from '../errors/authentication-error.js';
import type { OAuth2TokenResponse } from '../utils/oauth-types.js';

const CONSUMED_FIELDS = new Set(['access_token', 'refresh_token', 'expires_in', 'expires']);

/**
 * Bearer credential produced by a grant exchange.
 *
 * Immutable. Fields the client does not model (`id_token`, `token_type`,
 * `scope`, `session_state`, ...) are kept in {@link AccessToken.getValues}.
 * @public
 */
export class AccessToken {
  private readonly accessToken: string;
  private readonly refreshToken?: string;
  private readonly expires?: number;
  private readonly values: Readonly<Record<string, unknown>>;

  /**
   * @param response - Token endpoint response
   * @param now - Current epoch seconds, used to turn `expires_in` into an absolute expiry
   * @throws {AuthenticationError} When `access_token` is missing or empty
   */
  public constructor(
    response: OAuth2TokenResponse | Readonly<Record<string, unknown>>,
    now: number = Math.floor(Date.now() / 1000),
  ) {
    const { access_token, refresh_token, expires_in, expires } = response;
    if (typeof access_token !== 'string' || access_token.length === 0) {
      throw AuthenticationError.missingToken();
    }

    this.accessToken = access_token;
    this.refreshToken = typeof refresh_token === 'string' ? refresh_token : undefined;

    const expiresIn = toSeconds(expires_in);
    const expiresAt = toSeconds(expires);
    if (expiresIn !== undefined) {
      this.expires = now + expiresIn;
    } else if (expiresAt !== undefined) {
      this.expires = expiresAt;
    }

    this.values = Object.freeze(
      Object.fromEntries(Object.entries(response).filter(([key]) => !CONSUMED_FIELDS.has(key))),
    );
  }

  /** The raw access token value. */
  public getToken(): string {
    return this.accessToken;
  }

  public getRefreshToken(): string | undefined {
    return this.refreshToken;
  }

  /** Expiry as epoch seconds, when the provider sent one. */
  public getExpires(): number | undefined {
    return this.expires;
  }

  /**
   * Whether the expiry lies in the past. Tokens without an expiry never report
   * as expired.
   */
  public hasExpired(now: number = Math.floor(Date.now() / 1000)): boolean {
    return this.expires !== undefined && this.expires <= now;
  }

  public getIdToken(): string | undefined {
    const idToken = this.values.id_token;
    return typeof idToken === 'string' ? idToken : undefined;
  }

  public getValues(): Readonly<Record<string, unknown>> {
    return this.values;
  }

  /**
   * Serialises back to the token response shape, with `expires` as an
   * absolute timestamp.
   */
  public toJSON(): Record<string, unknown> {
    return {
      ...this.values,
      access_token: this.accessToken,
      ...(this.refreshToken !== undefined ? { refresh_token: this.refreshToken } : {}),
      ...(this.expires !== undefined ? { expires: this.expires } : {}),
    };
  }

  public toString(): string {
    return this.accessToken;
  }
}

/**
 * Providers send lifetimes as numbers, and occasionally as numeric strings.
 */
function toSeconds(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  return undefined;
}
