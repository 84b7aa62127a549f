import { AuthenticationError, AuthErrorCode } from '@realm-connect/auth';

/**
 * The provider was asked to verify an encoded response, or was constructed,
 * without a complete algorithm and key configuration.
 * @public
 */
export class EncryptionConfigurationError extends AuthenticationError {
  public constructor(message: string) {
    super(message, AuthErrorCode.CONFIGURATION_ERROR);
    this.name = 'EncryptionConfigurationError';
  }

  /**
   * An encoded response arrived but no algorithm and key are configured.
   */
  public static undeterminedEncryption(): EncryptionConfigurationError {
    return new EncryptionConfigurationError('undetermined encryption');
  }

  /**
   * Only one of algorithm and key was configured.
   * @param missing - The absent setting
   */
  public static partialConfiguration(
    missing: 'encryptionAlgorithm' | 'encryptionKey',
  ): EncryptionConfigurationError {
    return new EncryptionConfigurationError(
      `incomplete encryption configuration: ${missing} is missing`,
    );
  }
}
