import type { Env } from '../../config/env.js';
import { authError } from '../../utils/errors.js';
import { buildGitHubAuthorizationUrl, getGitHubProfileFromCode } from './github.service.js';
import { buildGoogleAuthorizationUrl, getGoogleProfileFromCode } from './google.service.js';
import { isSocialProviderKey, type SocialProfile, type SocialProviderKey } from './provider.base.js';

export type SocialProviderConfig = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

export type SocialProviderClient = {
  buildAuthorizationUrl: (params: { clientId: string; redirectUri: string; state: string }) => string;
  getProfileFromCode: (params: {
    code: string;
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    timeoutMs: number;
  }) => Promise<SocialProfile>;
};

export type SocialProviderRegistry = Record<SocialProviderKey, SocialProviderClient>;

export const socialProviders: SocialProviderRegistry = {
  google: {
    buildAuthorizationUrl: buildGoogleAuthorizationUrl,
    getProfileFromCode: getGoogleProfileFromCode,
  },
  github: {
    buildAuthorizationUrl: buildGitHubAuthorizationUrl,
    getProfileFromCode: getGitHubProfileFromCode,
  },
};

export function parseSocialProvider(value: string): SocialProviderKey {
  const provider = value.trim().toLowerCase();
  if (!isSocialProviderKey(provider)) {
    throw authError('UNKNOWN_PROVIDER', `UNKNOWN_PROVIDER:${provider}`);
  }
  return provider;
}

function normalizeBaseUrl(value: string): string {
  return value.trim().replace(/\/+$/, '');
}

export function resolvePublicBaseUrl(env: Env): string {
  return env.PUBLIC_BASE_URL ? normalizeBaseUrl(env.PUBLIC_BASE_URL) : `http://${env.HOST}:${env.PORT}`;
}

/**
 * Credentials for `provider`. The redirect URI falls back to this service's own
 * callback route when none is configured.
 */
export function resolveSocialProviderConfig(
  env: Env,
  provider: SocialProviderKey,
): SocialProviderConfig {
  const creds =
    provider === 'google'
      ? {
          clientId: env.GOOGLE_CLIENT_ID,
          clientSecret: env.GOOGLE_CLIENT_SECRET,
          redirectUri: env.GOOGLE_REDIRECT_URI,
        }
      : {
          clientId: env.GITHUB_CLIENT_ID,
          clientSecret: env.GITHUB_CLIENT_SECRET,
          redirectUri: env.GITHUB_REDIRECT_URI,
        };

  if (!creds.clientId || !creds.clientSecret) {
    // Misconfiguration; keep response generic.
    throw authError('PROVIDER_NOT_CONFIGURED', `${provider.toUpperCase()}_ENV_MISSING`);
  }

  return {
    clientId: creds.clientId,
    clientSecret: creds.clientSecret,
    redirectUri:
      creds.redirectUri ?? `${resolvePublicBaseUrl(env)}/auth/oauth/${provider}/callback`,
  };
}
