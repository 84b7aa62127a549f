/**
 * Claims as a plain map from claim name to JSON value.
 * @public
 */
export type ClaimsMap = Record<string, unknown>;

/**
 * Claims after resolution. Decoded tokens yield a frozen map; structured
 * responses are passed through as they came.
 * @public
 */
export type VerifiedClaims = Readonly<ClaimsMap>;

/**
 * A resource owner response, classified by shape.
 * @public
 */
export type RawResourceOwnerResponse =
  | { kind: 'encoded'; token: string }
  | { kind: 'structured'; claims: VerifiedClaims };

/**
 * Asymmetric JWS algorithms a realm public key can verify.
 * @public
 */
export const SUPPORTED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
  'EdDSA',
] as const;

export type SupportedAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

/** Clock skew tolerated on `nbf`, `exp` and `iat`, in seconds. */
export const DEFAULT_LEEWAY_SECONDS = 5;
