import { getUserRepository } from '../db/postgres.js';
import { authProviderOf, type AuthProvider, type UserRepository } from '../db/user-repository.js';
import { authError } from '../utils/errors.js';

export type AccountSummary = {
  email: string;
  authProvider: AuthProvider;
  isVerified: boolean;
};

/**
 * Profile of the account a verified access token names. A token for an account that
 * no longer exists is treated as invalid.
 */
export async function getAccountSummary(
  params: { email: string },
  deps?: { users?: UserRepository },
): Promise<AccountSummary> {
  const users = deps?.users ?? getUserRepository();
  const user = await users.findByEmail(params.email);
  if (!user) throw authError('TOKEN_INVALID', 'ACCESS_TOKEN_SUBJECT_MISSING');

  return {
    email: user.email,
    authProvider: authProviderOf(user),
    isVerified: user.isVerified,
  };
}
