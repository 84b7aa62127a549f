import { resolveConfigFields, type EnvVarPatternResolverConfig } from '@realm-connect/core';
import type { KeycloakConnectConfigInput } from './schemas.js';

const RESOLVABLE_FIELDS = [
  'authServerUrl',
  'realm',
  'clientId',
  'clientSecret',
  'redirectUri',
  'encryptionAlgorithm',
  'encryptionKey',
  'encryptionKeyString',
  'scope',
] as const satisfies readonly (keyof KeycloakConnectConfigInput)[];

/**
 * Resolves `${VAR}` / `${VAR:default}` references in the string fields of a
 * provider configuration.
 *
 * @example
 * ```typescript
 * const config = resolveKeycloakConfig({
 *   authServerUrl: '${KEYCLOAK_URL}',
 *   realm: '${KEYCLOAK_REALM:master}',
 *   clientId: '${KEYCLOAK_CLIENT_ID}',
 *   clientSecret: '${KEYCLOAK_CLIENT_SECRET}',
 * });
 * ```
 * @throws {EnvironmentResolutionError} When a referenced variable is missing
 * @public
 */
export function resolveKeycloakConfig(
  config: KeycloakConnectConfigInput,
  resolverConfig?: EnvVarPatternResolverConfig,
): KeycloakConnectConfigInput {
  return resolveConfigFields(config, RESOLVABLE_FIELDS, resolverConfig);
}
