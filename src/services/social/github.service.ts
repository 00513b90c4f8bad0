import { z } from 'zod';

import { authError } from '../../utils/errors.js';
import {
  ProviderJsonObjectSchema,
  fetchProviderJson,
  normalizeOptionalString,
  normalizeString,
  readAccessToken,
  validateSocialProfile,
  type SocialProfile,
} from './provider.base.js';

const GITHUB_AUTHORIZE_URL = 'https://github.com/login/oauth/authorize';
const GITHUB_TOKEN_URL = 'https://github.com/login/oauth/access_token';
const GITHUB_API_BASE = 'https://api.github.com';
const GITHUB_USER_AGENT = 'otp-auth-service';

export function buildGitHubAuthorizationUrl(params: {
  clientId: string;
  redirectUri: string;
  state: string;
}): string {
  const u = new URL(GITHUB_AUTHORIZE_URL);
  u.searchParams.set('response_type', 'code');
  u.searchParams.set('client_id', params.clientId);
  u.searchParams.set('redirect_uri', params.redirectUri);
  // Request only what we need: user profile + verified email selection.
  u.searchParams.set('scope', 'read:user user:email');
  u.searchParams.set('state', params.state);
  return u.toString();
}

function apiHeaders(accessToken: string): Record<string, string> {
  return {
    accept: 'application/vnd.github+json',
    authorization: `Bearer ${accessToken}`,
    'user-agent': GITHUB_USER_AGENT,
  };
}

async function exchangeCodeForAccessToken(params: {
  code: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs: number;
}): Promise<{ accessToken: string }> {
  const body = new URLSearchParams();
  body.set('client_id', params.clientId);
  body.set('client_secret', params.clientSecret);
  body.set('code', params.code);
  body.set('redirect_uri', params.redirectUri);

  const json = await fetchProviderJson({
    url: GITHUB_TOKEN_URL,
    init: {
      method: 'POST',
      headers: {
        accept: 'application/json',
        'content-type': 'application/x-www-form-urlencoded',
      },
      body,
    },
    timeoutMs: params.timeoutMs,
    failureMessage: 'GITHUB_TOKEN_EXCHANGE_FAILED',
  });

  // GitHub answers 200 with `{ error }` for a bad code; no access_token means failure.
  return { accessToken: readAccessToken(json, 'GITHUB_TOKEN_EXCHANGE_FAILED') };
}

const GitHubEmailSchema = z.object({
  email: z.string().trim().min(1),
  primary: z.boolean().catch(false),
  verified: z.boolean().catch(false),
});

type GitHubEmail = z.infer<typeof GitHubEmailSchema>;

function parseGitHubEmails(value: unknown): GitHubEmail[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((v: unknown) => {
    const parsed = GitHubEmailSchema.safeParse(v);
    return parsed.success ? [parsed.data] : [];
  });
}

function selectVerifiedEmail(emails: GitHubEmail[]): string {
  const verified = emails.filter((e) => e.verified);
  const primary = verified.find((e) => e.primary);
  return (primary ?? verified[0])?.email ?? '';
}

async function fetchGitHubVerifiedEmail(params: {
  accessToken: string;
  timeoutMs: number;
}): Promise<string> {
  const json = await fetchProviderJson({
    url: `${GITHUB_API_BASE}/user/emails`,
    init: { method: 'GET', headers: apiHeaders(params.accessToken) },
    timeoutMs: params.timeoutMs,
    failureMessage: 'GITHUB_EMAILS_FAILED',
  });

  const email = selectVerifiedEmail(parseGitHubEmails(json));
  if (!email) {
    throw authError('PROVIDER_EMAIL_MISSING', 'GITHUB_EMAIL_NOT_VERIFIED');
  }

  return email;
}

function normalizeSubjectId(value: unknown): string {
  // GitHub user ids are numeric.
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return normalizeString(value);
}

export async function getGitHubProfileFromCode(params: {
  code: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs: number;
}): Promise<SocialProfile> {
  const { accessToken } = await exchangeCodeForAccessToken(params);

  const userJson = await fetchProviderJson({
    url: `${GITHUB_API_BASE}/user`,
    init: { method: 'GET', headers: apiHeaders(accessToken) },
    timeoutMs: params.timeoutMs,
    failureMessage: 'GITHUB_USERINFO_FAILED',
  });
  const parsed = ProviderJsonObjectSchema.safeParse(userJson);
  const user: Record<string, unknown> = parsed.success ? parsed.data : {};

  const email = await fetchGitHubVerifiedEmail({ accessToken, timeoutMs: params.timeoutMs });
  const name = normalizeOptionalString(user.name) ?? normalizeOptionalString(user.login);

  return validateSocialProfile({
    provider: 'github',
    subjectId: normalizeSubjectId(user.id),
    email,
    emailVerified: true,
    name,
  });
}
