/**
 * OpenID Connect provider for Keycloak realms.
 *
 * @packageDocumentation
 */

export * from './keycloak-connect.js';
export * from './errors/index.js';
export * from './schemas.js';
export { resolveKeycloakConfig } from './config.js';
export { checkIdentityProviderResponse } from './response-check.js';
export { formatPublicKey } from './utils/format-public-key.js';
export * from './endpoints/realm-endpoints.js';
export * from './verification/response-verifier.js';
export * from './verification/types.js';
export * from './resource-owner/keycloak-resource-owner.js';
