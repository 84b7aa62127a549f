import { describe, it, expect } from 'vitest';
import { IdentityProviderError } from '../errors/identity-provider-error.js';
import {
  AuthenticationError,
  AuthErrorCode,
  OAuth2ErrorCode,
} from '../errors/authentication-error.js';

describe('IdentityProviderError', () => {
  it('joins error and description in the message', () => {
    const error = new IdentityProviderError({
      error: 'invalid_grant',
      error_description: 'bad code',
    });

    expect(error.message).toBe('invalid_grant: bad code');
    expect(error.error).toBe('invalid_grant');
    expect(error.description).toBe('bad code');
    expect(error.code).toBe(OAuth2ErrorCode.INVALID_GRANT);
  });

  it('keeps the provider description verbatim', () => {
    const error = new IdentityProviderError({
      error: 'invalid_request',
      error_description: 'Invalid redirect_uri https://app.example.com/oauth/callback/keycloak',
    });

    expect(error.message).toBe(
      'invalid_request: Invalid redirect_uri https://app.example.com/oauth/callback/keycloak',
    );
  });

  it('uses the bare error when there is no description', () => {
    const error = new IdentityProviderError({ error: 'access_denied' });

    expect(error.message).toBe('access_denied');
  });

  it('maps unknown provider codes', () => {
    expect(new IdentityProviderError({ error: 'realm_disabled' }).code).toBe(
      AuthErrorCode.UNKNOWN_ERROR,
    );
    expect(new IdentityProviderError({ error: 'realm_disabled' }, {}, 502).code).toBe(
      OAuth2ErrorCode.SERVER_ERROR,
    );
  });

  it('keeps the full payload read-only', () => {
    const payload = { error: 'invalid_grant', error_description: 'bad code', session: 's-1' };
    const error = new IdentityProviderError({ error: 'invalid_grant' }, payload);

    expect(error.response).toEqual(payload);
    expect(error.response).not.toBe(payload);
    expect(Object.isFrozen(error.response)).toBe(true);
  });

  it('is an AuthenticationError', () => {
    const error = new IdentityProviderError({ error: 'invalid_client' });

    expect(error).toBeInstanceOf(IdentityProviderError);
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.name).toBe('IdentityProviderError');
    expect(error.toJSON()).toMatchObject({
      name: 'IdentityProviderError',
      code: 'invalid_client',
      error: 'invalid_client',
    });
  });
});

describe('AuthenticationError', () => {
  it('redacts bearer tokens from messages', () => {
    const error = new AuthenticationError('request with Bearer abc.def failed');

    expect(error.message).toBe('request with Bearer [REDACTED] failed');
  });

  it('redacts credential parameters from messages', () => {
    const error = new AuthenticationError('body was refresh_token=r1&client_secret=s1');

    expect(error.message).toBe('body was refresh_token=[REDACTED]&client_secret=[REDACTED]');
  });

  it('redacts JWTs from messages', () => {
    const error = new AuthenticationError('got eyJhbGciOi.eyJzdWIi.c2ln back');

    expect(error.message).toBe('got [REDACTED_JWT] back');
  });

  it('defaults to unknown_error', () => {
    expect(new AuthenticationError('boom').code).toBe(AuthErrorCode.UNKNOWN_ERROR);
  });
});
