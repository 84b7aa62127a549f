import { errors, importSPKI, jwtVerify } from 'jose';
import { logEvent } from '@realm-connect/core';
import { EncryptionConfigurationError } from '../errors/encryption-configuration-error.js';
import { SignatureVerificationError } from '../errors/signature-verification-error.js';
import {
  DEFAULT_LEEWAY_SECONDS,
  type ClaimsMap,
  type RawResourceOwnerResponse,
  type VerifiedClaims,
} from './types.js';

/**
 * Verification settings. Algorithm and key must both be set for encoded
 * responses to resolve.
 * @public
 */
export interface ResponseVerifierOptions {
  /** JWS algorithm the provider signs with; the only one accepted */
  encryptionAlgorithm?: string;
  /** SPKI PEM public key */
  encryptionKey?: string;
  /** Clock skew tolerated on time claims */
  leewaySeconds?: number;
}

/**
 * Turns a resource owner response into claims.
 *
 * Structured responses are returned untouched. Encoded responses (compact
 * JWS strings) are verified against the configured key, accepting only the
 * configured algorithm and allowing `leewaySeconds` of clock skew on
 * `nbf`/`exp`/`iat`. The verifier keeps no state between calls.
 *
 * @example
 * ```typescript
 * const verifier = new ResponseVerifier({ encryptionAlgorithm: 'RS256', encryptionKey: pem });
 * const claims = await verifier.resolve(token.getToken());
 * ```
 * @public
 */
export class ResponseVerifier {
  private readonly algorithm?: string;
  private readonly key?: string;
  private readonly leewaySeconds: number;

  public constructor(options: ResponseVerifierOptions = {}) {
    this.algorithm = options.encryptionAlgorithm;
    this.key = options.encryptionKey;
    this.leewaySeconds = options.leewaySeconds ?? DEFAULT_LEEWAY_SECONDS;
  }

  /**
   * Whether both an algorithm and a key are configured.
   */
  public usesEncryption(): boolean {
    return Boolean(this.algorithm) && Boolean(this.key);
  }

  public classify(raw: string | ClaimsMap): RawResourceOwnerResponse {
    return typeof raw === 'string'
      ? { kind: 'encoded', token: raw }
      : { kind: 'structured', claims: raw };
  }

  /**
   * @throws {EncryptionConfigurationError} When an encoded response arrives without algorithm and key
   * @throws {SignatureVerificationError} When the encoded response does not verify
   */
  public async resolve(raw: string | ClaimsMap): Promise<VerifiedClaims> {
    const response = this.classify(raw);

    switch (response.kind) {
      case 'structured':
        return response.claims;
      case 'encoded':
        return this.verify(response.token);
    }
  }

  private async verify(token: string): Promise<VerifiedClaims> {
    if (!this.algorithm || !this.key) {
      throw EncryptionConfigurationError.undeterminedEncryption();
    }

    try {
      const key = await importSPKI(this.key, this.algorithm);
      const { payload } = await jwtVerify(token, key, {
        algorithms: [this.algorithm],
        clockTolerance: this.leewaySeconds,
      });

      // jwtVerify only bounds iat when maxTokenAge is set
      if (
        typeof payload.iat === 'number' &&
        payload.iat > Math.floor(Date.now() / 1000) + this.leewaySeconds
      ) {
        throw new errors.JWTClaimValidationFailed(
          '"iat" claim timestamp check failed',
          payload,
          'iat',
          'check_failed',
        );
      }

      logEvent('debug', 'keycloak:token_verified', { algorithm: this.algorithm });
      return toClaimsMap(payload);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logEvent('warn', 'keycloak:token_verification_failed', {
        algorithm: this.algorithm,
        error: cause.message,
      });
      throw new SignatureVerificationError(cause);
    }
  }
}

/**
 * Copies verified claims into a frozen plain map of JSON values.
 */
function toClaimsMap(payload: object): VerifiedClaims {
  const plain: unknown = JSON.parse(JSON.stringify(payload));
  const claims: ClaimsMap = typeof plain === 'object' && plain !== null ? { ...plain } : {};
  return Object.freeze(claims);
}
