// Errors
export * from './errors/authentication-error.js';
export * from './errors/identity-provider-error.js';

// Client
export * from './client/generic-oauth2-client.js';
export * from './token/access-token.js';

export * from './schemas.js';

// Utilities
export * from './utils/oauth-types.js';
export * from './utils/auth-url.js';
export * from './utils/token-exchange.js';
export * from './utils/error/index.js';
export { generateState } from './utils/pkce.js';
