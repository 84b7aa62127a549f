const PEM_LINE_WIDTH = 64;
const PEM_HEADER = '-----BEGIN PUBLIC KEY-----';
const PEM_FOOTER = '-----END PUBLIC KEY-----';

/**
 * Wraps a bare base64 public key, as shown in the realm's key settings, into
 * an SPKI PEM block.
 *
 * The body is cut into 64-character lines, each terminated by a newline. The
 * input is not validated; an unusable key fails later, at verification.
 * @example
 * ```typescript
 * formatPublicKey('MIIBIjANBgkq...');
 * // '-----BEGIN PUBLIC KEY-----\nMIIBIjANBgkq...\n-----END PUBLIC KEY-----'
 * ```
 * @public
 */
export function formatPublicKey(raw: string): string {
  let body = '';
  for (let offset = 0; offset < raw.length; offset += PEM_LINE_WIDTH) {
    body += `${raw.slice(offset, offset + PEM_LINE_WIDTH)}\n`;
  }
  return `${PEM_HEADER}\n${body}${PEM_FOOTER}`;
}
