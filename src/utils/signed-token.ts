import { SignJWT, errors, jwtVerify } from 'jose';
import type { z } from 'zod';

const SIGNED_TOKEN_ALLOWED_ALGS = ['HS256'] as const;

export type SignedTokenKeys = {
  secret: string;
  // Used as both `iss` and `aud`; a token minted by another service never verifies here.
  issuer: string;
};

export type DecodedToken<T> = {
  claims: T;
  issuedAt: Date;
  expiresAt: Date;
};

export type DecodeResult<T> =
  | { status: 'ok'; token: DecodedToken<T> }
  | { status: 'invalid' }
  | { status: 'expired' };

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Serializes `claims` with `iat`/`exp` into an HS256 JWT.
 */
export async function encodeSignedToken(params: {
  claims: Record<string, unknown>;
  subject?: string;
  keys: SignedTokenKeys;
  now: Date;
  ttlSeconds: number;
}): Promise<{ token: string; expiresAt: Date }> {
  const iat = toEpochSeconds(params.now);
  const exp = iat + params.ttlSeconds;

  const jwt = new SignJWT(params.claims)
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .setIssuer(params.keys.issuer)
    .setAudience(params.keys.issuer)
    .setIssuedAt(iat)
    .setExpirationTime(exp);

  if (params.subject !== undefined) jwt.setSubject(params.subject);

  const token = await jwt.sign(secretKey(params.keys.secret));
  return { token, expiresAt: new Date(exp * 1000) };
}

/**
 * Verifies signature, issuer and audience first, then claim shape, then expiry.
 * A tampered token, or one minted for another purpose, is `invalid` even when it is
 * also past its expiry.
 */
export async function decodeSignedToken<S extends z.ZodTypeAny>(params: {
  token: string;
  schema: S;
  keys: SignedTokenKeys;
  now: Date;
}): Promise<DecodeResult<z.infer<S>>> {
  let payload: Record<string, unknown>;
  try {
    const res = await jwtVerify(params.token, secretKey(params.keys.secret), {
      algorithms: [...SIGNED_TOKEN_ALLOWED_ALGS],
      issuer: params.keys.issuer,
      audience: params.keys.issuer,
      currentDate: params.now,
    });
    payload = res.payload;
  } catch (err) {
    if (err instanceof errors.JWTExpired) {
      // jose checks `exp` only after the signature, so this payload is authentic.
      return params.schema.safeParse(err.payload).success
        ? { status: 'expired' }
        : { status: 'invalid' };
    }
    return { status: 'invalid' };
  }

  const parsed = params.schema.safeParse(payload);
  if (!parsed.success) return { status: 'invalid' };

  const iat = payload.iat;
  const exp = payload.exp;
  if (typeof iat !== 'number' || typeof exp !== 'number') return { status: 'invalid' };

  return {
    status: 'ok',
    token: {
      claims: parsed.data,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    },
  };
}
