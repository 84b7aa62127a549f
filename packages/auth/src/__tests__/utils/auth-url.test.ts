import { describe, it, expect } from 'vitest';
import { appendQuery, buildQueryString } from '../../utils/auth-url.js';

describe('buildQueryString', () => {
  it('form-encodes values in insertion order', () => {
    expect(
      buildQueryString({ redirect_uri: 'https://app.example.com/a b', state: 's' }),
    ).toBe('redirect_uri=https%3A%2F%2Fapp.example.com%2Fa+b&state=s');
  });

  it('drops undefined values', () => {
    expect(buildQueryString({ a: '1', b: undefined, c: 2, d: false })).toBe('a=1&c=2&d=false');
  });

  it('joins arrays with the separator', () => {
    expect(buildQueryString({ scope: ['openid', 'email'] })).toBe('scope=openid+email');
    expect(buildQueryString({ scope: ['openid', 'email'] }, ',')).toBe('scope=openid%2Cemail');
  });

  it('returns an empty string for no params', () => {
    expect(buildQueryString({})).toBe('');
  });
});

describe('appendQuery', () => {
  it('adds a question mark to a bare URL', () => {
    expect(appendQuery('https://idp.example.com/logout', 'a=1')).toBe(
      'https://idp.example.com/logout?a=1',
    );
  });

  it('continues an existing query', () => {
    expect(appendQuery('https://idp.example.com/auth?x=1', '?a=1')).toBe(
      'https://idp.example.com/auth?x=1&a=1',
    );
  });

  it('leaves the URL alone for an empty query', () => {
    expect(appendQuery('https://idp.example.com/logout', '')).toBe(
      'https://idp.example.com/logout',
    );
  });
});
