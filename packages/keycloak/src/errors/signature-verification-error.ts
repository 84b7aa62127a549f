import { errors } from 'jose';
import { AuthenticationError, AuthErrorCode } from '@realm-connect/auth';

/**
 * Cryptographic verification of an encoded response failed: bad signature,
 * disallowed algorithm, time claims outside the leeway, unusable key, or a
 * malformed token.
 *
 * `reason` carries the verifier's error code, e.g. `ERR_JWT_EXPIRED`.
 * @public
 */
export class SignatureVerificationError extends AuthenticationError {
  public readonly reason?: string;

  public constructor(cause: Error) {
    super(`token verification failed: ${cause.message}`, AuthErrorCode.INVALID_TOKEN, cause);
    this.name = 'SignatureVerificationError';
    this.reason = cause instanceof errors.JOSEError ? cause.code : undefined;
  }

  public override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}
