import { randomBytes } from 'crypto';

/**
 * Short id carried by every log event of one outgoing provider request,
 * e.g. `token-3f9a1c0b7e42`.
 * @param kind - Which endpoint the request goes to
 * @public
 */
export function createRequestId(kind: string): string {
  return `${kind}-${randomBytes(6).toString('hex')}`;
}
