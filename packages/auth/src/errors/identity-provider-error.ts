import { AuthenticationError } from './authentication-error.js';
import type { OAuth2ErrorResponse } from '../utils/oauth-types.js';
import { mapOAuth2ErrorCode } from '../utils/error/create-oauth2-error.js';

/**
 * The identity provider answered a grant or userinfo request with an explicit
 * `error` payload.
 *
 * `error` is the provider's code verbatim, `code` its mapping onto
 * {@link OAuth2ErrorCode} (unknown codes map to `unknown_error`), and
 * `response` the full parsed body. The message is `error: error_description`
 * exactly as the provider sent it.
 * @public
 */
export class IdentityProviderError extends AuthenticationError {
  public readonly error: string;
  public readonly description?: string;
  public readonly response: Readonly<Record<string, unknown>>;

  public constructor(
    payload: OAuth2ErrorResponse,
    response: Record<string, unknown> = { ...payload },
    statusCode?: number,
  ) {
    const message = payload.error_description
      ? `${payload.error}: ${payload.error_description}`
      : payload.error;
    super(message, mapOAuth2ErrorCode(payload.error, statusCode));
    // the provider's own wording, unsanitised
    this.message = message;
    this.name = 'IdentityProviderError';
    this.error = payload.error;
    this.description = payload.error_description;
    this.response = Object.freeze({ ...response });
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      error: this.error,
      description: this.description,
    };
  }
}
