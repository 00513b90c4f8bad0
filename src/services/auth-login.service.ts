import { getEnv } from '../config/env.js';
import { getUserRepository } from '../db/postgres.js';
import type { UserRepository } from '../db/user-repository.js';
import { authError } from '../utils/errors.js';
import { issueAccessToken } from './access-token.service.js';
import { accountStateAt, normalizeEmail } from './account-state.service.js';
import { issueAndDeliverOtp, type OtpDeliveryDeps } from './otp-delivery.service.js';
import { verifyPassword } from './password.service.js';

type LoginDeps = OtpDeliveryDeps & {
  users?: UserRepository;
  verifyPassword?: typeof verifyPassword;
  issueAccessToken?: typeof issueAccessToken;
  issueAndDeliverOtp?: typeof issueAndDeliverOtp;
};

export type LoginResult =
  | { status: 'authenticated'; accessToken: string; expiresInSeconds: number }
  | { status: 'otp_required' };

export async function loginWithEmailPassword(
  params: { email: string; password: string },
  deps?: LoginDeps,
): Promise<LoginResult> {
  const env = deps?.env ?? getEnv();
  const users = deps?.users ?? getUserRepository();
  const email = normalizeEmail(params.email);

  const user = await users.findByEmail(email);
  // Provider-only accounts have no hash and always fail here.
  const passwordHash = user?.provenance.kind === 'local' ? user.provenance.passwordHash : null;
  const ok = await (deps?.verifyPassword ?? verifyPassword)(params.password, passwordHash);

  if (!ok || !user) {
    // Never reveal whether the email exists or the password was wrong.
    throw authError('INVALID_CREDENTIALS');
  }

  const now = deps?.now ? deps.now() : new Date();
  const state = accountStateAt(user, now, env);

  if (state === 'pending_verification') {
    throw authError('NOT_VERIFIED');
  }

  if (state === 'reverification_due') {
    await (deps?.issueAndDeliverOtp ?? issueAndDeliverOtp)(
      { email, purpose: 'login' },
      { ...deps, env },
    );
    return { status: 'otp_required' };
  }

  const { token, expiresInSeconds } = await (deps?.issueAccessToken ?? issueAccessToken)(
    { email },
    { env, now: deps?.now },
  );
  return { status: 'authenticated', accessToken: token, expiresInSeconds };
}
