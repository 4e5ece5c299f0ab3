import { createHmac, timingSafeEqual } from 'node:crypto';
import { type TokenClaims, tokenClaimsSchema, epochSeconds } from '@tally/shared';

const HEADER = { alg: 'HS256', typ: 'JWT' } as const;

function base64url(data: string): string {
  return Buffer.from(data).toString('base64url');
}

function base64urlDecode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function sign(input: string, secret: string): string {
  return createHmac('sha256', secret).update(input).digest('base64url');
}

function parseJson(segment: string): unknown {
  try {
    return JSON.parse(base64urlDecode(segment));
  } catch {
    return null;
  }
}

export function signJwt(subject: string, secret: string, expirySeconds: number): string {
  const header = base64url(JSON.stringify(HEADER));
  const now = epochSeconds();
  const claims: TokenClaims = {
    sub: subject,
    iat: now,
    exp: now + expirySeconds,
  };
  const body = base64url(JSON.stringify(claims));

  return `${header}.${body}.${sign(`${header}.${body}`, secret)}`;
}

/**
 * Returns the claim set of a well-formed, correctly signed, unexpired token,
 * and null for anything else. A token is expired from the second named by `exp`.
 */
export function verifyJwt(token: string, secret: string): TokenClaims | null {
  const parts = token.split('.');
  if (parts.length !== 3) return null;

  const [header, body, signature] = parts;

  // Verify signature
  const expected = Buffer.from(sign(`${header}.${body}`, secret));
  const given = Buffer.from(signature);
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) return null;

  const decodedHeader = parseJson(header);
  if (
    typeof decodedHeader !== 'object' || decodedHeader === null
    || !('alg' in decodedHeader) || decodedHeader.alg !== HEADER.alg
  ) {
    return null;
  }

  // Parse and check expiry
  const parsed = tokenClaimsSchema.safeParse(parseJson(body));
  if (!parsed.success) return null;
  if (parsed.data.exp <= epochSeconds()) return null;

  return parsed.data;
}
