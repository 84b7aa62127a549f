/**
 * Random values for the authorization request
 */
import { randomBytes } from 'crypto';

/**
 * Encodes a buffer to URL-safe base64 per RFC 4648 Section 5.
 * @internal
 */
export function base64URLEncode(buffer: Buffer): string {
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Generates a cryptographically random OAuth2 state parameter (22 characters).
 *
 * Callers keep it and compare it with the `state` returned on the redirect
 * to the callback URL.
 * @public
 */
export function generateState(): string {
  return base64URLEncode(randomBytes(16));
}
