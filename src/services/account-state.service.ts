import type { Env } from '../config/env.js';
import type { UserRecord } from '../db/user-repository.js';
import { AppError } from '../utils/errors.js';

export type AccountState = 'pending_verification' | 'verified' | 'reverification_due';

export function normalizeEmail(email: string): string {
  const normalized = email.trim().toLowerCase();
  if (!normalized) throw new AppError('BAD_REQUEST', 400, 'EMAIL_REQUIRED');
  return normalized;
}

/**
 * Where a stored account sits in the verification lifecycle at `now`.
 *
 * A local account that verified a code more than one token lifetime ago must verify
 * again before the next token. Federated accounts are verified by their provider and
 * never fall due.
 */
export function accountStateAt(
  user: Pick<UserRecord, 'provenance' | 'isActive' | 'isVerified' | 'lastOtpVerifiedAt'>,
  now: Date,
  env: Pick<Env, 'ACCESS_TOKEN_EXPIRE_MINUTES'>,
): AccountState {
  if (!user.isActive || !user.isVerified) return 'pending_verification';
  if (user.provenance.kind === 'federated') return 'verified';

  const last = user.lastOtpVerifiedAt;
  if (!last) return 'reverification_due';

  const windowMs = env.ACCESS_TOKEN_EXPIRE_MINUTES * 60 * 1000;
  return last.getTime() < now.getTime() - windowMs ? 'reverification_due' : 'verified';
}
