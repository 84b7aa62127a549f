export { EncryptionConfigurationError } from './encryption-configuration-error.js';
export { SignatureVerificationError } from './signature-verification-error.js';
export { IdentityProviderError } from '@realm-connect/auth';
