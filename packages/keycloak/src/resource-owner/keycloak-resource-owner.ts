import type { VerifiedClaims } from '../verification/types.js';

/**
 * Resource owner identity backed by verified claims.
 *
 * Accessors never throw: a claim the realm did not issue reads as
 * `undefined`, or as an empty list for roles.
 * @public
 */
export class KeycloakResourceOwner {
  private readonly claims: VerifiedClaims;

  public constructor(claims: VerifiedClaims) {
    this.claims = Object.isFrozen(claims) ? claims : Object.freeze({ ...claims });
  }

  /** Subject identifier (`sub`). */
  public getId(): string | undefined {
    return this.getString('sub');
  }

  public getName(): string | undefined {
    return this.getString('name');
  }

  public getEmail(): string | undefined {
    return this.getString('email');
  }

  public isEmailVerified(): boolean | undefined {
    const verified = this.claims.email_verified;
    return typeof verified === 'boolean' ? verified : undefined;
  }

  public getPreferredUsername(): string | undefined {
    return this.getString('preferred_username');
  }

  public getGivenName(): string | undefined {
    return this.getString('given_name');
  }

  public getFamilyName(): string | undefined {
    return this.getString('family_name');
  }

  /** Realm roles from `realm_access.roles`. */
  public getRealmRoles(): string[] {
    return readRoles(this.claims.realm_access);
  }

  /** Client roles from `resource_access[clientId].roles`. */
  public getClientRoles(clientId: string): string[] {
    const resourceAccess = this.claims.resource_access;
    return isRecord(resourceAccess) ? readRoles(resourceAccess[clientId]) : [];
  }

  public getClaim(name: string): unknown {
    return this.claims[name];
  }

  /** All claims. */
  public toArray(): VerifiedClaims {
    return this.claims;
  }

  public toJSON(): VerifiedClaims {
    return this.claims;
  }

  private getString(name: string): string | undefined {
    const value = this.claims[name];
    return typeof value === 'string' ? value : undefined;
  }
}

/**
 * Wraps claims into a resource owner. No completeness check.
 * @public
 */
export function createResourceOwner(claims: VerifiedClaims): KeycloakResourceOwner {
  return new KeycloakResourceOwner(claims);
}

function readRoles(access: unknown): string[] {
  if (!isRecord(access) || !Array.isArray(access.roles)) {
    return [];
  }
  return access.roles.filter((role): role is string => typeof role === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
