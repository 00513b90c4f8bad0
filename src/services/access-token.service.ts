import { z } from 'zod';

import { ACCESS_TOKEN_TYPE } from '../config/constants.js';
import { getEnv, type Env } from '../config/env.js';
import { AppError } from '../utils/errors.js';
import { decodeSignedToken, encodeSignedToken } from '../utils/signed-token.js';

const AccessTokenClaimsSchema = z
  .object({
    sub: z.string().trim().min(1),
    typ: z.literal(ACCESS_TOKEN_TYPE),
  })
  .passthrough();

export type AccessTokenVerification =
  | { status: 'ok'; email: string; expiresAt: Date }
  | { status: 'invalid' }
  | { status: 'expired' };

type AccessTokenDeps = {
  env?: Env;
  now?: () => Date;
};

export async function issueAccessToken(
  params: { email: string },
  deps?: AccessTokenDeps,
): Promise<{ token: string; expiresAt: Date; expiresInSeconds: number }> {
  const env = deps?.env ?? getEnv();
  const now = deps?.now ? deps.now() : new Date();
  const ttlSeconds = env.ACCESS_TOKEN_EXPIRE_MINUTES * 60;

  try {
    const { token, expiresAt } = await encodeSignedToken({
      claims: { typ: ACCESS_TOKEN_TYPE },
      subject: params.email,
      keys: { secret: env.SECRET_KEY, issuer: env.AUTH_SERVICE_IDENTIFIER },
      now,
      ttlSeconds,
    });
    return { token, expiresAt, expiresInSeconds: ttlSeconds };
  } catch {
    throw new AppError('INTERNAL', 500, 'ACCESS_TOKEN_SIGN_FAILED');
  }
}

/**
 * Pure and stateless. `expired` is reported only for tokens that are otherwise valid,
 * so callers can tell "sign in again" apart from "not ours".
 */
export async function verifyAccessToken(
  token: string,
  deps?: AccessTokenDeps,
): Promise<AccessTokenVerification> {
  const env = deps?.env ?? getEnv();
  const now = deps?.now ? deps.now() : new Date();

  const res = await decodeSignedToken({
    token,
    schema: AccessTokenClaimsSchema,
    keys: { secret: env.SECRET_KEY, issuer: env.AUTH_SERVICE_IDENTIFIER },
    now,
  });

  if (res.status !== 'ok') return res;
  return { status: 'ok', email: res.token.claims.sub, expiresAt: res.token.expiresAt };
}
