import {
  ProviderJsonObjectSchema,
  fetchProviderJson,
  normalizeOptionalString,
  normalizeString,
  readAccessToken,
  validateSocialProfile,
  type SocialProfile,
} from './provider.base.js';

const GOOGLE_AUTHORIZE_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
const GOOGLE_USERINFO_URL = 'https://openidconnect.googleapis.com/v1/userinfo';

function parseBooleanish(value: unknown): boolean {
  if (value === true) return true;
  if (value === false) return false;
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
  if (typeof value === 'number') return value === 1;
  return false;
}

export function buildGoogleAuthorizationUrl(params: {
  clientId: string;
  redirectUri: string;
  state: string;
}): string {
  const u = new URL(GOOGLE_AUTHORIZE_URL);
  u.searchParams.set('response_type', 'code');
  u.searchParams.set('client_id', params.clientId);
  u.searchParams.set('redirect_uri', params.redirectUri);
  u.searchParams.set('scope', 'openid email profile');
  u.searchParams.set('state', params.state);
  // Keep minimal; no offline access, no refresh tokens.
  u.searchParams.set('access_type', 'online');
  return u.toString();
}

async function exchangeCodeForAccessToken(params: {
  code: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs: number;
}): Promise<{ accessToken: string }> {
  const body = new URLSearchParams();
  body.set('code', params.code);
  body.set('client_id', params.clientId);
  body.set('client_secret', params.clientSecret);
  body.set('redirect_uri', params.redirectUri);
  body.set('grant_type', 'authorization_code');

  const json = await fetchProviderJson({
    url: GOOGLE_TOKEN_URL,
    init: {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body,
    },
    timeoutMs: params.timeoutMs,
    failureMessage: 'GOOGLE_TOKEN_EXCHANGE_FAILED',
  });

  return { accessToken: readAccessToken(json, 'GOOGLE_TOKEN_EXCHANGE_FAILED') };
}

export async function getGoogleProfileFromCode(params: {
  code: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  timeoutMs: number;
}): Promise<SocialProfile> {
  const { accessToken } = await exchangeCodeForAccessToken(params);

  const info = await fetchProviderJson({
    url: GOOGLE_USERINFO_URL,
    init: {
      method: 'GET',
      headers: { authorization: `Bearer ${accessToken}` },
    },
    timeoutMs: params.timeoutMs,
    failureMessage: 'GOOGLE_USERINFO_FAILED',
  });
  const parsed = ProviderJsonObjectSchema.safeParse(info);
  const obj: Record<string, unknown> = parsed.success ? parsed.data : {};

  return validateSocialProfile({
    provider: 'google',
    subjectId: normalizeString(obj.sub),
    email: normalizeString(obj.email),
    // Some providers serialize booleans as strings.
    emailVerified: parseBooleanish(obj.email_verified),
    name: normalizeOptionalString(obj.name),
  });
}
