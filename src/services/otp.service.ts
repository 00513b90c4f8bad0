import { randomInt } from 'node:crypto';
import { z } from 'zod';

import { OTP_KEY_PREFIX } from '../config/constants.js';
import { getEnv, type Env } from '../config/env.js';
import type { CodeStore } from '../db/code-store.js';
import { getCodeStore } from '../db/redis.js';
import { hashOtpCode, otpCodeHashesEqual } from '../utils/otp-code-hash.js';

export type OtpValidationResult =
  | { status: 'ok' }
  | { status: 'code_mismatch' }
  | { status: 'code_expired' }
  | { status: 'no_code_issued' };

export type OtpDeps = {
  env?: Env;
  codes?: CodeStore;
  now?: () => Date;
  generateOtpCode?: typeof generateOtpCode;
};

const OtpEntrySchema = z.object({
  code_hash: z.string().min(1),
  expires_at: z.number().int(),
});

type OtpEntry = z.infer<typeof OtpEntrySchema>;

function otpKey(email: string): string {
  return `${OTP_KEY_PREFIX}${email}`;
}

function parseEntry(raw: string): OtpEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = OtpEntrySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * `length` digits, each uniform over 0-9 from a CSPRNG. Leading zeros are kept.
 */
export function generateOtpCode(length: number): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error(`OTP length must be a positive integer, got ${length}`);
  }

  let code = '';
  for (let i = 0; i < length; i += 1) {
    code += String(randomInt(10));
  }
  return code;
}

/**
 * Stores a fresh code for `email`, replacing any code issued before. Returns the
 * plaintext for delivery; only its keyed hash is stored.
 */
export async function issueOtp(params: { email: string }, deps?: OtpDeps): Promise<string> {
  const env = deps?.env ?? getEnv();
  const codes = deps?.codes ?? getCodeStore();
  const now = deps?.now ? deps.now() : new Date();

  const code = (deps?.generateOtpCode ?? generateOtpCode)(env.OTP_LENGTH);
  const entry: OtpEntry = {
    code_hash: hashOtpCode(code, env.SECRET_KEY),
    expires_at: now.getTime() + env.OTP_EXPIRE_SECONDS * 1000,
  };

  // The store keeps the entry a little past `expires_at` so a late attempt reads as
  // expired; after that it is simply gone.
  await codes.set(
    otpKey(params.email),
    JSON.stringify(entry),
    env.OTP_EXPIRE_SECONDS + env.OTP_EXPIRED_RETENTION_SECONDS,
  );

  return code;
}

export async function validateOtp(
  params: { email: string; code: string },
  deps?: OtpDeps,
): Promise<OtpValidationResult> {
  const env = deps?.env ?? getEnv();
  const codes = deps?.codes ?? getCodeStore();
  const now = deps?.now ? deps.now() : new Date();
  const key = otpKey(params.email);

  const raw = await codes.get(key);
  if (raw === null) return { status: 'no_code_issued' };

  const entry = parseEntry(raw);
  if (!entry) {
    await codes.deleteIfMatch(key, raw);
    return { status: 'no_code_issued' };
  }

  if (now.getTime() > entry.expires_at) {
    await codes.deleteIfMatch(key, raw);
    return { status: 'code_expired' };
  }

  const presentedHash = hashOtpCode(params.code.trim(), env.SECRET_KEY);
  if (!otpCodeHashesEqual(presentedHash, entry.code_hash)) {
    return { status: 'code_mismatch' };
  }

  // Only the caller that actually removes this exact entry wins. A concurrent
  // validation, or a re-issue in between, leaves nothing for the others.
  const consumed = await codes.deleteIfMatch(key, raw);
  return consumed ? { status: 'ok' } : { status: 'no_code_issued' };
}

export async function invalidateOtp(params: { email: string }, deps?: OtpDeps): Promise<void> {
  const codes = deps?.codes ?? getCodeStore();
  await codes.delete(otpKey(params.email));
}
