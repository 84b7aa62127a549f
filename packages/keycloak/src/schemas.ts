/**
 * Keycloak provider configuration schema with field normalization.
 *
 * - `encryptionKeyString` (the bare base64 key from the realm's key settings)
 *   is formatted into a PEM `encryptionKey` unless one is given
 * - `scope` (space or comma separated string) is accepted for `scopes`
 * - trailing slashes are stripped from `authServerUrl`
 *
 * @example
 * ```typescript
 * const config = KeycloakConnectConfigSchema.parse({
 *   authServerUrl: 'https://idp.example.com/',
 *   realm: 'demo',
 *   clientId: 'web',
 *   encryptionAlgorithm: 'RS256',
 *   encryptionKeyString: 'MIIBIjANBgkq...',
 * });
 * // config.authServerUrl === 'https://idp.example.com'
 * // config.encryptionKey starts with '-----BEGIN PUBLIC KEY-----'
 * ```
 *
 * @public
 */

import { z } from 'zod';
import { normalizeAliases } from '@realm-connect/auth';
import { formatPublicKey } from './utils/format-public-key.js';
import { SUPPORTED_ALGORITHMS } from './verification/types.js';

const ALIASES: Readonly<Record<string, string>> = {
  client_id: 'clientId',
  client_secret: 'clientSecret',
  redirect_uri: 'redirectUri',
  'auth-server-url': 'authServerUrl',
};

function normalizeKeycloakInput(input: unknown): unknown {
  const normalized = normalizeAliases(input, ALIASES);
  if (typeof normalized !== 'object' || normalized === null || Array.isArray(normalized)) {
    return normalized;
  }

  const result: Record<string, unknown> = { ...normalized };

  if (typeof result.encryptionKeyString === 'string' && result.encryptionKeyString) {
    if (result.encryptionKey === undefined) {
      result.encryptionKey = formatPublicKey(result.encryptionKeyString);
    }
  }
  delete result.encryptionKeyString;

  if (result.scopes === undefined && typeof result.scope === 'string') {
    result.scopes = result.scope.split(/[\s,]+/).filter(Boolean);
  }
  delete result.scope;

  return result;
}

const KeycloakConnectConfigBaseSchema = z.object({
  authServerUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  realm: z.string().min(1, 'realm is required'),
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1).optional(),
  redirectUri: z.string().url().optional(),
  encryptionAlgorithm: z.enum(SUPPORTED_ALGORITHMS).optional(),
  encryptionKey: z.string().min(1).optional(),
  scopes: z.array(z.string().min(1)).optional(),
});

export const KeycloakConnectConfigSchema = z.preprocess(
  normalizeKeycloakInput,
  KeycloakConnectConfigBaseSchema,
);

/** Validated provider configuration */
export type KeycloakConnectConfig = z.output<typeof KeycloakConnectConfigBaseSchema>;

/**
 * Provider configuration as written by callers, including the
 * `encryptionKeyString` and `scope` shorthands.
 */
export type KeycloakConnectConfigInput = z.input<typeof KeycloakConnectConfigBaseSchema> & {
  encryptionKeyString?: string;
  scope?: string;
};
