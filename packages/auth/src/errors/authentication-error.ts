/**
 * Standard OAuth2 error codes as defined in RFC 6749
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
}

/**
 * Additional authentication error codes beyond RFC 6749
 */
export enum AuthErrorCode {
  INVALID_TOKEN = 'invalid_token',
  MISSING_TOKEN = 'missing_token',
  CONFIGURATION_ERROR = 'configuration_error',
  NETWORK_ERROR = 'network_error',
  UNKNOWN_ERROR = 'unknown_error',
}

export type ErrorCode = OAuth2ErrorCode | AuthErrorCode;

/**
 * Authentication error class that extends base Error with OAuth2 error code support.
 * Never exposes tokens or secrets in its message.
 */
export class AuthenticationError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: ErrorCode = AuthErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Removes token-like values and credential parameters from a message
   */
  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\beyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]*/g, '[REDACTED_JWT]')
      .replace(/\b[a-zA-Z0-9+/]{20,}={0,2}\b/g, '[REDACTED_TOKEN]')
      .replace(/\bBearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bcode[=:]\s*[^\s&]+/gi, 'code=[REDACTED]');
  }

  /**
   * Creates an AuthenticationError for a token endpoint response without access_token
   */
  public static missingToken(): AuthenticationError {
    return new AuthenticationError(
      'OAuth2 token response missing access_token field',
      AuthErrorCode.MISSING_TOKEN,
    );
  }

  /**
   * Creates an AuthenticationError for invalid client configuration
   */
  public static invalidConfiguration(
    description: string,
    cause?: Error,
  ): AuthenticationError {
    return new AuthenticationError(
      `Invalid OAuth2 client configuration: ${description}`,
      AuthErrorCode.CONFIGURATION_ERROR,
      cause,
    );
  }

  /**
   * Creates an AuthenticationError for network-related failures
   */
  public static networkError(
    message: string,
    cause?: Error,
  ): AuthenticationError {
    return new AuthenticationError(
      `Network error during authentication: ${message}`,
      AuthErrorCode.NETWORK_ERROR,
      cause,
    );
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}
