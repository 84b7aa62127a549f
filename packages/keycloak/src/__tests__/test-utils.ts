import { exportSPKI, generateKeyPair, SignJWT, type JWTPayload, type KeyLike } from 'jose';
import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

export interface RealmKeys {
  privateKey: KeyLike;
  publicKeyPem: string;
}

/**
 * Generates a realm signing key pair with its public half as SPKI PEM.
 */
export async function createRealmKeys(algorithm = 'RS256'): Promise<RealmKeys> {
  const { privateKey, publicKey } = await generateKeyPair(algorithm, { extractable: true });
  return { privateKey, publicKeyPem: await exportSPKI(publicKey) };
}

/**
 * The bare base64 body of a PEM key, as the realm settings page shows it.
 */
export function stripPem(pem: string): string {
  return pem.replace(/-----(BEGIN|END) PUBLIC KEY-----/g, '').replace(/\s+/g, '');
}

/**
 * Signs claims the way the realm signs access tokens.
 */
export async function signClaims(
  claims: JWTPayload,
  privateKey: KeyLike,
  options: { algorithm?: string; issuedAt?: number; notBefore?: number; expiresAt?: number } = {},
): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  const jwt = new SignJWT(claims)
    .setProtectedHeader({ alg: options.algorithm ?? 'RS256' })
    .setIssuedAt(options.issuedAt ?? now)
    .setExpirationTime(options.expiresAt ?? now + 300);
  if (options.notBefore !== undefined) {
    jwt.setNotBefore(options.notBefore);
  }
  return jwt.sign(privateKey);
}

export function createMockFetch(): FetchMock {
  return vi.fn<typeof fetch>();
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function jwtResponse(token: string): Response {
  return new Response(token, {
    status: 200,
    headers: { 'Content-Type': 'application/jwt' },
  });
}

/**
 * The URL and form body of the nth fetch call.
 */
export function getRequest(
  mockFetch: FetchMock,
  index = 0,
): { url: string; headers: Headers; form: URLSearchParams } {
  const call = mockFetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  return {
    url: String(input),
    headers: new Headers(init?.headers),
    form: new URLSearchParams(typeof init?.body === 'string' ? init.body : ''),
  };
}
