import { getEnv } from '../config/env.js';
import { getUserRepository } from '../db/postgres.js';
import type { UserRepository } from '../db/user-repository.js';
import { authError, isAppError } from '../utils/errors.js';
import { normalizeEmail } from './account-state.service.js';
import { issueAndDeliverOtp, type OtpDeliveryDeps } from './otp-delivery.service.js';
import { hashPassword } from './password.service.js';

type RegisterDeps = OtpDeliveryDeps & {
  users?: UserRepository;
  hashPassword?: typeof hashPassword;
  issueAndDeliverOtp?: typeof issueAndDeliverOtp;
};

/**
 * Creates a local account in pending-verification state and mails its first code.
 *
 * With REGISTER_CONCEAL_EXISTING the response for a taken email is the same as for a new
 * one and nothing is written or sent; otherwise it fails with DUPLICATE_EMAIL.
 */
export async function registerWithEmailPassword(
  params: { email: string; password: string },
  deps?: RegisterDeps,
): Promise<void> {
  const env = deps?.env ?? getEnv();
  const users = deps?.users ?? getUserRepository();
  const email = normalizeEmail(params.email);

  const existing = await users.findByEmail(email);
  if (existing) {
    if (env.REGISTER_CONCEAL_EXISTING) return;
    throw authError('DUPLICATE_EMAIL');
  }

  const passwordHash = await (deps?.hashPassword ?? hashPassword)(params.password);

  try {
    await users.createLocal({ email, passwordHash });
  } catch (err) {
    // Lost a race with a concurrent registration of the same email.
    if (env.REGISTER_CONCEAL_EXISTING && isDuplicateEmail(err)) return;
    throw err;
  }

  // A delivery failure leaves the account pending; resend recovers it.
  await (deps?.issueAndDeliverOtp ?? issueAndDeliverOtp)(
    { email, purpose: 'registration' },
    { ...deps, env },
  );
}

function isDuplicateEmail(err: unknown): boolean {
  return isAppError(err) && err.reason === 'DUPLICATE_EMAIL';
}
