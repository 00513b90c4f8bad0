import { describe, expect, it, vi } from 'vitest';

import { createMemoryCodeStore } from '../../src/db/code-store.js';
import type { UserRecord, UserRepository } from '../../src/db/user-repository.js';
import { verifyAccessToken } from '../../src/services/access-token.service.js';
import type { SocialProviderRegistry } from '../../src/services/social/index.js';
import type { SocialProfile } from '../../src/services/social/provider.base.js';
import {
  completeSocialLogin,
  startSocialLogin,
} from '../../src/services/social/social-login.service.js';
import { signSocialState } from '../../src/services/social/social-state.service.js';
import { authError } from '../../src/utils/errors.js';
import {
  createMemoryUserRepository,
  federatedUser,
  localUser,
} from '../helpers/memory-user-repository.js';
import { testClock, testEnv } from '../helpers/test-env.js';

function googleProfile(overrides?: Partial<SocialProfile>): SocialProfile {
  return {
    provider: 'google',
    subjectId: 'google-sub-1',
    email: 'social@example.com',
    emailVerified: true,
    name: 'Social User',
    ...overrides,
  };
}

function setup(opts?: { profile?: SocialProfile; env?: ReturnType<typeof testEnv> }) {
  const clock = testClock('2026-01-01T00:00:00.000Z');
  const env = opts?.env ?? testEnv();
  const users = createMemoryUserRepository();
  const codes = createMemoryCodeStore({ now: clock.nowMs });
  const getProfileFromCode = vi.fn(async () => opts?.profile ?? googleProfile());
  const providers: SocialProviderRegistry = {
    google: {
      buildAuthorizationUrl: (p) => `https://idp.example.com/google?state=${p.state}&redirect_uri=${p.redirectUri}`,
      getProfileFromCode,
    },
    github: {
      buildAuthorizationUrl: (p) => `https://idp.example.com/github?state=${p.state}`,
      getProfileFromCode: vi.fn(async () => googleProfile({ provider: 'github' })),
    },
  };
  const deps = { env, now: clock.now, users, codes, providers };
  return { clock, env, users, codes, providers, getProfileFromCode, deps };
}

describe('startSocialLogin', () => {
  it('returns an authorization URL carrying a fresh state', async () => {
    const { deps } = setup();

    const res = await startSocialLogin({ provider: 'google' }, deps);

    expect(res.provider).toBe('google');
    expect(res.authorizationUrl).toBe(
      `https://idp.example.com/google?state=${res.state}&redirect_uri=https://auth.example.com/auth/oauth/google/callback`,
    );
  });

  it('passes a caller-supplied redirect URI through', async () => {
    const { deps } = setup();
    const res = await startSocialLogin(
      { provider: 'google', redirectUri: 'https://app.example.com/cb' },
      deps,
    );
    expect(res.authorizationUrl).toContain('redirect_uri=https://app.example.com/cb');
  });

  it('fails with PROVIDER_NOT_CONFIGURED without credentials', async () => {
    const { deps } = setup({ env: testEnv({ GITHUB_CLIENT_ID: undefined }) });
    await expect(startSocialLogin({ provider: 'github' }, deps)).rejects.toMatchObject({
      reason: 'PROVIDER_NOT_CONFIGURED',
    });
  });
});

describe('completeSocialLogin', () => {
  it('creates a pre-verified federated account and returns an access token', async () => {
    const { deps, users, getProfileFromCode, env } = setup();
    const { state } = await startSocialLogin({ provider: 'google' }, deps);

    const res = await completeSocialLogin({ provider: 'google', code: 'provider-code', state }, deps);

    expect(res.provider).toBe('google');
    expect(res.expiresInSeconds).toBe(1800);
    await expect(verifyAccessToken(res.accessToken, { env, now: deps.now })).resolves.toMatchObject({
      status: 'ok',
      email: 'social@example.com',
    });

    expect(getProfileFromCode).toHaveBeenCalledWith({
      code: 'provider-code',
      clientId: 'google-client-id',
      clientSecret: 'google-client-secret',
      redirectUri: 'https://auth.example.com/auth/oauth/google/callback',
      timeoutMs: 10_000,
    });

    const stored = users.users.get('social@example.com');
    expect(stored).toMatchObject({
      provenance: { kind: 'federated', provider: 'google', subjectId: 'google-sub-1' },
      isActive: true,
      isVerified: true,
    });
  });

  it('logs an existing federated account in again', async () => {
    const { deps, users } = setup();
    users.users.set('social@example.com', federatedUser());

    const { state } = await startSocialLogin({ provider: 'google' }, deps);
    const res = await completeSocialLogin({ provider: 'google', code: 'c', state }, deps);

    expect(res.provider).toBe('google');
    expect(users.users.size).toBe(1);
  });

  it('rejects a replayed state', async () => {
    const { deps, getProfileFromCode } = setup();
    const { state } = await startSocialLogin({ provider: 'google' }, deps);

    await completeSocialLogin({ provider: 'google', code: 'c', state }, deps);
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).rejects.toMatchObject({ reason: 'STATE_INVALID', message: 'SOCIAL_STATE_REPLAYED' });
    expect(getProfileFromCode).toHaveBeenCalledTimes(1);
  });

  it('allows a replayed state when single-use is off', async () => {
    const { deps } = setup({ env: testEnv({ OAUTH_STATE_SINGLE_USE: false }) });
    const { state } = await startSocialLogin({ provider: 'google' }, deps);

    await completeSocialLogin({ provider: 'google', code: 'c', state }, deps);
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).resolves.toMatchObject({ provider: 'google' });
  });

  it('rejects a state minted for another provider before calling the provider', async () => {
    const { deps, getProfileFromCode } = setup();
    const { state } = await signSocialState({ provider: 'github' }, deps);

    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).rejects.toMatchObject({ reason: 'PROVIDER_MISMATCH', statusCode: 400 });
    expect(getProfileFromCode).not.toHaveBeenCalled();
  });

  it('rejects an expired state', async () => {
    const { deps, clock } = setup();
    const { state } = await startSocialLogin({ provider: 'google' }, deps);

    clock.advanceSeconds(601);
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).rejects.toMatchObject({ reason: 'STATE_EXPIRED' });
  });

  it('rejects a forged state', async () => {
    const { deps } = setup();
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state: 'forged.state.value' }, deps),
    ).rejects.toMatchObject({ reason: 'STATE_INVALID' });
  });

  it('refuses to bind a provider login to an existing local account', async () => {
    const { deps, users } = setup();
    users.users.set('social@example.com', localUser({ email: 'social@example.com' }));

    const { state } = await startSocialLogin({ provider: 'google' }, deps);
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).rejects.toMatchObject({ reason: 'ACCOUNT_PROVIDER_CONFLICT' });
  });

  it('refuses an account bound to a different provider subject', async () => {
    const { deps, users } = setup({ profile: googleProfile({ subjectId: 'google-sub-2' }) });
    users.users.set('social@example.com', federatedUser());

    const { state } = await startSocialLogin({ provider: 'google' }, deps);
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).rejects.toMatchObject({ reason: 'ACCOUNT_PROVIDER_CONFLICT' });
  });

  it('rejects provider profiles whose email is not verified', async () => {
    const { deps, users } = setup({ profile: googleProfile({ emailVerified: false }) });
    const { state } = await startSocialLogin({ provider: 'google' }, deps);

    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, deps),
    ).rejects.toMatchObject({ reason: 'PROVIDER_EMAIL_MISSING' });
    expect(users.users.size).toBe(0);
  });

  it('logs both in when two first-time callbacks for one identity race', async () => {
    const { deps, users } = setup();
    // Holds the first two lookups until both have read "no such user".
    const waiting: Array<() => void> = [];
    const racingUsers: UserRepository = {
      ...users,
      async findByEmail(email) {
        const found = await users.findByEmail(email);
        if (waiting.length < 2) {
          await new Promise<void>((resolve) => {
            waiting.push(resolve);
            if (waiting.length === 2) waiting.forEach((release) => release());
          });
        }
        return found;
      },
    };
    const raceDeps = { ...deps, users: racingUsers };

    const first = await startSocialLogin({ provider: 'google' }, raceDeps);
    const second = await startSocialLogin({ provider: 'google' }, raceDeps);
    const results = await Promise.allSettled([
      completeSocialLogin({ provider: 'google', code: 'c1', state: first.state }, raceDeps),
      completeSocialLogin({ provider: 'google', code: 'c2', state: second.state }, raceDeps),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled']);
    expect(users.users.size).toBe(1);
    expect(users.users.get('social@example.com')?.provenance).toEqual({
      kind: 'federated',
      provider: 'google',
      subjectId: 'google-sub-1',
    });
  });

  it('reports a conflict when a password account wins the race for the email', async () => {
    const { deps } = setup();
    let lookups = 0;
    const users: UserRepository = {
      async findByEmail(): Promise<UserRecord | null> {
        lookups += 1;
        return lookups === 1 ? null : localUser({ email: 'social@example.com' });
      },
      createLocal: vi.fn(),
      async createFederated(): Promise<UserRecord> {
        throw authError('DUPLICATE_EMAIL');
      },
      markOtpVerified: vi.fn(),
    };
    const raceDeps = { ...deps, users };

    const { state } = await startSocialLogin({ provider: 'google' }, raceDeps);
    await expect(
      completeSocialLogin({ provider: 'google', code: 'c', state }, raceDeps),
    ).rejects.toMatchObject({ reason: 'ACCOUNT_PROVIDER_CONFLICT' });
    expect(lookups).toBe(2);
  });
});
