import { getUserRepository } from '../db/postgres.js';
import type { UserRepository } from '../db/user-repository.js';
import { authError } from '../utils/errors.js';
import { normalizeEmail } from './account-state.service.js';
import { validateOtp, type OtpDeps } from './otp.service.js';

type VerifyOtpDeps = OtpDeps & {
  users?: UserRepository;
  validateOtp?: typeof validateOtp;
};

/**
 * Consumes the account's pending code. On success the account becomes active and
 * verified and its verification timestamp moves to now; failures change nothing.
 */
export async function verifyEmailOtp(
  params: { email: string; code: string },
  deps?: VerifyOtpDeps,
): Promise<{ verifiedAt: Date }> {
  const users = deps?.users ?? getUserRepository();
  const email = normalizeEmail(params.email);

  const user = await users.findByEmail(email);
  if (!user) throw authError('ACCOUNT_NOT_FOUND');

  const result = await (deps?.validateOtp ?? validateOtp)({ email, code: params.code }, deps);
  switch (result.status) {
    case 'ok':
      break;
    case 'code_mismatch':
      throw authError('CODE_MISMATCH');
    case 'code_expired':
      throw authError('CODE_EXPIRED');
    case 'no_code_issued':
      throw authError('NO_CODE_ISSUED');
  }

  const verifiedAt = deps?.now ? deps.now() : new Date();
  await users.markOtpVerified({ email, verifiedAt });
  return { verifiedAt };
}
