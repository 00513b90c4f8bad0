import { randomBytes } from 'node:crypto';
import { z } from 'zod';

import { OAUTH_NONCE_KEY_PREFIX, OAUTH_STATE_TOKEN_TYPE } from '../../config/constants.js';
import { getEnv, type Env } from '../../config/env.js';
import type { CodeStore } from '../../db/code-store.js';
import { getCodeStore } from '../../db/redis.js';
import { AppError } from '../../utils/errors.js';
import { decodeSignedToken, encodeSignedToken } from '../../utils/signed-token.js';
import { SOCIAL_PROVIDER_KEYS, type SocialProviderKey } from './provider.base.js';

const SocialStateSchema = z.object({
  provider: z.enum(SOCIAL_PROVIDER_KEYS),
  nonce: z.string().min(1),
  typ: z.literal(OAUTH_STATE_TOKEN_TYPE),
});

export type SocialStateCheck =
  | { status: 'ok'; nonce: string; expiresAt: Date }
  | { status: 'invalid' }
  | { status: 'expired' }
  | { status: 'provider_mismatch' };

type SocialStateDeps = {
  env?: Env;
  now?: () => Date;
  codes?: CodeStore;
};

function stateKeys(env: Env): { secret: string; issuer: string } {
  return { secret: env.SECRET_KEY, issuer: env.AUTH_SERVICE_IDENTIFIER };
}

export async function signSocialState(
  params: { provider: SocialProviderKey },
  deps?: SocialStateDeps,
): Promise<{ state: string; expiresAt: Date }> {
  const env = deps?.env ?? getEnv();
  const now = deps?.now ? deps.now() : new Date();

  try {
    const { token, expiresAt } = await encodeSignedToken({
      claims: {
        provider: params.provider,
        nonce: randomBytes(16).toString('base64url'),
        typ: OAUTH_STATE_TOKEN_TYPE,
      },
      keys: stateKeys(env),
      now,
      ttlSeconds: env.OAUTH_STATE_TTL_SECONDS,
    });
    return { state: token, expiresAt };
  } catch {
    throw new AppError('INTERNAL', 500, 'SOCIAL_STATE_SIGN_FAILED');
  }
}

/**
 * Stateless check of a state token against the provider whose callback received it.
 * Signature and structure are checked before expiry, and expiry before the provider.
 */
export async function checkSocialState(
  params: { provider: SocialProviderKey; state: string },
  deps?: SocialStateDeps,
): Promise<SocialStateCheck> {
  const env = deps?.env ?? getEnv();
  const now = deps?.now ? deps.now() : new Date();

  const res = await decodeSignedToken({
    token: params.state,
    schema: SocialStateSchema,
    keys: stateKeys(env),
    now,
  });
  if (res.status !== 'ok') return res;

  if (res.token.claims.provider !== params.provider) {
    return { status: 'provider_mismatch' };
  }

  return { status: 'ok', nonce: res.token.claims.nonce, expiresAt: res.token.expiresAt };
}

/**
 * Records the state's nonce for the rest of its lifetime. Returns false when the
 * nonce was already consumed, i.e. the state is being replayed.
 */
export async function consumeSocialStateNonce(
  params: { nonce: string; expiresAt: Date },
  deps?: SocialStateDeps,
): Promise<boolean> {
  const codes = deps?.codes ?? getCodeStore();
  const now = deps?.now ? deps.now() : new Date();

  const remainingSeconds = Math.max(
    1,
    Math.ceil((params.expiresAt.getTime() - now.getTime()) / 1000),
  );
  return await codes.setIfAbsent(`${OAUTH_NONCE_KEY_PREFIX}${params.nonce}`, '1', remainingSeconds);
}
