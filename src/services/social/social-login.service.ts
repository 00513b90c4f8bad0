import { getEnv, type Env } from '../../config/env.js';
import type { CodeStore } from '../../db/code-store.js';
import { getUserRepository } from '../../db/postgres.js';
import type { UserRecord, UserRepository } from '../../db/user-repository.js';
import { authError, isAppError } from '../../utils/errors.js';
import { issueAccessToken } from '../access-token.service.js';
import {
  resolveSocialProviderConfig,
  socialProviders,
  type SocialProviderRegistry,
} from './index.js';
import {
  assertProviderVerifiedEmail,
  type SocialProfile,
  type SocialProviderKey,
} from './provider.base.js';
import {
  checkSocialState,
  consumeSocialStateNonce,
  signSocialState,
} from './social-state.service.js';

type SocialLoginDeps = {
  env?: Env;
  now?: () => Date;
  codes?: CodeStore;
  users?: UserRepository;
  providers?: SocialProviderRegistry;
  issueAccessToken?: typeof issueAccessToken;
};

export async function startSocialLogin(
  params: { provider: SocialProviderKey; redirectUri?: string },
  deps?: SocialLoginDeps,
): Promise<{ provider: SocialProviderKey; authorizationUrl: string; state: string }> {
  const env = deps?.env ?? getEnv();
  const config = resolveSocialProviderConfig(env, params.provider);
  const client = (deps?.providers ?? socialProviders)[params.provider];

  const { state } = await signSocialState({ provider: params.provider }, { ...deps, env });
  const authorizationUrl = client.buildAuthorizationUrl({
    clientId: config.clientId,
    redirectUri: params.redirectUri ?? config.redirectUri,
    state,
  });

  return { provider: params.provider, authorizationUrl, state };
}

function assertSameProvenance(existing: UserRecord, profile: SocialProfile): UserRecord {
  // An email binds to exactly one provenance; never merge silently.
  const p = existing.provenance;
  if (p.kind !== 'federated' || p.provider !== profile.provider || p.subjectId !== profile.subjectId) {
    throw authError('ACCOUNT_PROVIDER_CONFLICT');
  }
  return existing;
}

async function findOrCreateFederatedUser(
  users: UserRepository,
  profile: SocialProfile,
): Promise<UserRecord> {
  const existing = await users.findByEmail(profile.email);
  if (existing) return assertSameProvenance(existing, profile);

  try {
    return await users.createFederated({
      email: profile.email,
      provider: profile.provider,
      subjectId: profile.subjectId,
    });
  } catch (err) {
    if (!isAppError(err) || err.reason !== 'DUPLICATE_EMAIL') throw err;
    // A concurrent callback created the row first; load it instead.
    const created = await users.findByEmail(profile.email);
    if (!created) throw err;
    return assertSameProvenance(created, profile);
  }
}

/**
 * Completes a federated login: validates the state, exchanges the code, binds or loads
 * the account and mints an access token. Password and one-time code are not involved.
 */
export async function completeSocialLogin(
  params: { provider: SocialProviderKey; code: string; state: string; redirectUri?: string },
  deps?: SocialLoginDeps,
): Promise<{ provider: SocialProviderKey; accessToken: string; expiresInSeconds: number }> {
  const env = deps?.env ?? getEnv();
  const stateDeps = { ...deps, env };
  const config = resolveSocialProviderConfig(env, params.provider);
  const client = (deps?.providers ?? socialProviders)[params.provider];

  const check = await checkSocialState(
    { provider: params.provider, state: params.state },
    stateDeps,
  );
  switch (check.status) {
    case 'ok':
      break;
    case 'invalid':
      throw authError('STATE_INVALID');
    case 'expired':
      throw authError('STATE_EXPIRED');
    case 'provider_mismatch':
      throw authError('PROVIDER_MISMATCH');
  }

  if (env.OAUTH_STATE_SINGLE_USE) {
    const fresh = await consumeSocialStateNonce(
      { nonce: check.nonce, expiresAt: check.expiresAt },
      stateDeps,
    );
    if (!fresh) throw authError('STATE_INVALID', 'SOCIAL_STATE_REPLAYED');
  }

  const profile = await client.getProfileFromCode({
    code: params.code,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    redirectUri: params.redirectUri ?? config.redirectUri,
    timeoutMs: env.PROVIDER_HTTP_TIMEOUT_MS,
  });
  assertProviderVerifiedEmail(profile);

  const users = deps?.users ?? getUserRepository();
  const user = await findOrCreateFederatedUser(users, profile);

  const { token, expiresInSeconds } = await (deps?.issueAccessToken ?? issueAccessToken)(
    { email: user.email },
    { env, now: deps?.now },
  );
  return { provider: params.provider, accessToken: token, expiresInSeconds };
}
