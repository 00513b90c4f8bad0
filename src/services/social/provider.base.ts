import { z } from 'zod';

import { authError } from '../../utils/errors.js';

export const SOCIAL_PROVIDER_KEYS = ['google', 'github'] as const;

export type SocialProviderKey = (typeof SOCIAL_PROVIDER_KEYS)[number];

export type SocialProfile = {
  provider: SocialProviderKey;
  // Stable provider-side account id; survives email changes at the provider.
  subjectId: string;
  email: string;
  emailVerified: boolean;
  name: string | null;
};

const SocialProfileSchema = z.object({
  provider: z.enum(SOCIAL_PROVIDER_KEYS),
  subjectId: z.string().trim().min(1),
  email: z.string().trim().toLowerCase().email(),
  emailVerified: z.boolean(),
  name: z.string().trim().min(1).nullable(),
});

export function isSocialProviderKey(value: string): value is SocialProviderKey {
  return SOCIAL_PROVIDER_KEYS.some((key) => key === value);
}

export function validateSocialProfile(value: unknown): SocialProfile {
  const parsed = SocialProfileSchema.safeParse(value);
  if (!parsed.success) {
    const emailInvalid = parsed.error.issues.some((issue) => issue.path[0] === 'email');
    throw emailInvalid
      ? authError('PROVIDER_EMAIL_MISSING', 'SOCIAL_PROFILE_EMAIL_INVALID')
      : authError('PROVIDER_EXCHANGE_FAILED', 'SOCIAL_PROFILE_INVALID');
  }
  return parsed.data;
}

/**
 * Only provider-verified emails may bind to an account.
 */
export function assertProviderVerifiedEmail(profile: SocialProfile): void {
  if (!profile.emailVerified) {
    throw authError('PROVIDER_EMAIL_MISSING', 'SOCIAL_EMAIL_NOT_VERIFIED');
  }
}

// Provider endpoints return loosely shaped JSON; pick fields without trusting types.
export const ProviderJsonObjectSchema = z.record(z.unknown());

export function normalizeString(value: unknown): string {
  if (typeof value !== 'string') return '';
  return value.trim();
}

export function normalizeOptionalString(value: unknown): string | null {
  const s = normalizeString(value);
  return s ? s : null;
}

/**
 * GET/POST against a provider with a hard timeout. Any transport, status or JSON
 * failure becomes PROVIDER_EXCHANGE_FAILED with `failureMessage` kept internal.
 */
export async function fetchProviderJson(params: {
  url: string;
  init: RequestInit;
  timeoutMs: number;
  failureMessage: string;
}): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(params.url, {
      ...params.init,
      signal: AbortSignal.timeout(params.timeoutMs),
    });
  } catch {
    throw authError('PROVIDER_EXCHANGE_FAILED', params.failureMessage);
  }

  if (!res.ok) {
    throw authError('PROVIDER_EXCHANGE_FAILED', params.failureMessage);
  }

  try {
    return await res.json();
  } catch {
    throw authError('PROVIDER_EXCHANGE_FAILED', params.failureMessage);
  }
}

export function readAccessToken(json: unknown, failureMessage: string): string {
  const parsed = ProviderJsonObjectSchema.safeParse(json);
  const accessToken = parsed.success ? normalizeString(parsed.data.access_token) : '';
  if (!accessToken) {
    throw authError('PROVIDER_EXCHANGE_FAILED', failureMessage);
  }
  return accessToken;
}
