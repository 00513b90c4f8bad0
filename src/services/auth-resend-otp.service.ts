import { getEnv } from '../config/env.js';
import { getUserRepository } from '../db/postgres.js';
import type { UserRepository } from '../db/user-repository.js';
import { authError } from '../utils/errors.js';
import { accountStateAt, normalizeEmail } from './account-state.service.js';
import { issueAndDeliverOtp, type OtpDeliveryDeps } from './otp-delivery.service.js';
import { invalidateOtp } from './otp.service.js';

type ResendOtpDeps = OtpDeliveryDeps & {
  users?: UserRepository;
  issueAndDeliverOtp?: typeof issueAndDeliverOtp;
};

/**
 * Replaces the account's code with a fresh one. Only accounts that still owe a
 * verification (pending, or due for re-verification) get one.
 */
export async function resendEmailOtp(
  params: { email: string },
  deps?: ResendOtpDeps,
): Promise<void> {
  const env = deps?.env ?? getEnv();
  const users = deps?.users ?? getUserRepository();
  const now = deps?.now ? deps.now() : new Date();
  const email = normalizeEmail(params.email);

  const user = await users.findByEmail(email);
  if (!user) throw authError('ACCOUNT_NOT_FOUND');
  if (user.provenance.kind === 'federated') {
    throw authError('ALREADY_VERIFIED', 'FEDERATED_ACCOUNT_HAS_NO_OTP');
  }
  if (accountStateAt(user, now, env) === 'verified') {
    throw authError('ALREADY_VERIFIED');
  }

  const otpDeps = { ...deps, env };
  // Explicit invalidation first: the old code is dead even if issuing the new one fails.
  await invalidateOtp({ email }, otpDeps);
  await (deps?.issueAndDeliverOtp ?? issueAndDeliverOtp)({ email, purpose: 'resend' }, otpDeps);
}
