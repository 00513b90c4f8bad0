import argon2 from 'argon2';

import { AppError } from '../utils/errors.js';

// Argon2id with parameters sized to be reasonably strong without being so slow it
// harms UX or tests. The output includes salt + parameters.
const ARGON2_OPTIONS: argon2.Options & { type: number } = {
  type: argon2.argon2id,
  timeCost: 3,
  // argon2 expects memoryCost in KiB.
  memoryCost: 2 ** 15, // 32 MiB
  parallelism: 1,
  hashLength: 32,
};

// When an account has no password hash (unknown email, provider-only account) we still
// run a verify against this dummy hash so the request does not short-circuit cheaply.
const DUMMY_ARGON2ID_HASH =
  '$argon2id$v=19$m=32768,t=3,p=1$onb6T27gs47vxfVunB08uQ$hadGiwenm9HEKxSvGEbaklz91en+kFM92aGWwSFMYGY';

export async function hashPassword(password: string): Promise<string> {
  try {
    return await argon2.hash(password, ARGON2_OPTIONS);
  } catch {
    throw new AppError('INTERNAL', 500, 'PASSWORD_HASH_FAILED');
  }
}

/**
 * False whenever `passwordHash` is absent: provider-only accounts cannot
 * authenticate with a password.
 */
export async function verifyPassword(
  password: string,
  passwordHash: string | null | undefined,
): Promise<boolean> {
  const hasHash = typeof passwordHash === 'string' && passwordHash.length > 0;
  const hashToVerify = hasHash ? passwordHash : DUMMY_ARGON2ID_HASH;

  let ok: boolean;
  try {
    ok = await argon2.verify(hashToVerify, password);
  } catch {
    // Corrupt/unknown hash formats fail closed, but still pay for one verify.
    await argon2.verify(DUMMY_ARGON2ID_HASH, password).catch(() => false);
    return false;
  }

  return hasHash && ok;
}
