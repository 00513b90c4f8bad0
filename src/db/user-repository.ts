import type { Pool } from 'pg';

import type { SocialProviderKey } from '../services/social/provider.base.js';
import { authError, isAppError } from '../utils/errors.js';

export type AuthProvider = 'local' | SocialProviderKey;

export type AccountProvenance =
  | { kind: 'local'; passwordHash: string }
  | { kind: 'federated'; provider: SocialProviderKey; subjectId: string };

export type UserRecord = {
  id: string;
  email: string;
  provenance: AccountProvenance;
  isActive: boolean;
  isVerified: boolean;
  lastOtpVerifiedAt: Date | null;
  createdAt: Date;
};

/**
 * Durable identity store, keyed by normalized email.
 */
export type UserRepository = {
  findByEmail: (email: string) => Promise<UserRecord | null>;
  // Both creators reject an email that already exists with DUPLICATE_EMAIL.
  createLocal: (params: { email: string; passwordHash: string }) => Promise<UserRecord>;
  createFederated: (params: {
    email: string;
    provider: SocialProviderKey;
    subjectId: string;
  }) => Promise<UserRecord>;
  markOtpVerified: (params: { email: string; verifiedAt: Date }) => Promise<void>;
};

export function authProviderOf(user: Pick<UserRecord, 'provenance'>): AuthProvider {
  return user.provenance.kind === 'local' ? 'local' : user.provenance.provider;
}

type UserRow = {
  id: string;
  email: string;
  password_hash: string | null;
  auth_provider: string;
  provider_subject_id: string | null;
  is_active: boolean;
  is_verified: boolean;
  last_otp_verified_at: Date | null;
  created_at: Date;
};

const USER_COLUMNS = `
  id,
  email,
  password_hash,
  auth_provider,
  provider_subject_id,
  is_active,
  is_verified,
  last_otp_verified_at,
  created_at
`;

function isSocialProviderKey(value: string): value is SocialProviderKey {
  return value === 'google' || value === 'github';
}

function provenanceFromRow(row: UserRow): AccountProvenance {
  if (row.auth_provider === 'local') {
    if (row.password_hash === null) {
      throw new Error(`user ${row.id} is local but has no password hash`);
    }
    return { kind: 'local', passwordHash: row.password_hash };
  }

  if (!isSocialProviderKey(row.auth_provider) || row.provider_subject_id === null) {
    throw new Error(`user ${row.id} has an unusable provider binding`);
  }
  return { kind: 'federated', provider: row.auth_provider, subjectId: row.provider_subject_id };
}

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    provenance: provenanceFromRow(row),
    isActive: row.is_active,
    isVerified: row.is_verified,
    lastOtpVerifiedAt: row.last_otp_verified_at,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

export function createPgUserRepository(pool: Pool): UserRepository {
  const insert = async (values: {
    email: string;
    passwordHash: string | null;
    authProvider: AuthProvider;
    subjectId: string | null;
    verified: boolean;
  }): Promise<UserRecord> => {
    try {
      const { rows } = await pool.query<UserRow>(
        `
          INSERT INTO users (email, password_hash, auth_provider, provider_subject_id, is_active, is_verified)
          VALUES ($1, $2, $3, $4, $5, $5)
          RETURNING ${USER_COLUMNS};
        `,
        [values.email, values.passwordHash, values.authProvider, values.subjectId, values.verified],
      );
      const row = rows[0];
      if (!row) throw new Error('user insert returned no row');
      return toUserRecord(row);
    } catch (err) {
      if (isUniqueViolation(err)) throw authError('DUPLICATE_EMAIL');
      throw err;
    }
  };

  return {
    async findByEmail(email) {
      const { rows } = await pool.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE email = $1 LIMIT 1;`,
        [email],
      );
      const row = rows[0];
      return row ? toUserRecord(row) : null;
    },

    async createLocal(params) {
      return await insert({
        email: params.email,
        passwordHash: params.passwordHash,
        authProvider: 'local',
        subjectId: null,
        verified: false,
      });
    },

    async createFederated(params) {
      // Provider accounts are pre-verified by the provider.
      return await insert({
        email: params.email,
        passwordHash: null,
        authProvider: params.provider,
        subjectId: params.subjectId,
        verified: true,
      });
    },

    async markOtpVerified(params) {
      await pool.query(
        `
          UPDATE users
          SET is_active = TRUE,
              is_verified = TRUE,
              last_otp_verified_at = $2
          WHERE email = $1;
        `,
        [params.email, params.verifiedAt],
      );
    },
  };
}

function userStoreFailure(op: string, err: unknown): Error {
  // DUPLICATE_EMAIL and other domain errors pass through unchanged.
  if (isAppError(err)) return err;
  console.error('[user-store:error]', {
    op,
    errorName: err instanceof Error ? err.name : 'UnknownError',
  });
  return authError('STORE_UNAVAILABLE', `USER_STORE_${op.toUpperCase()}_FAILED`);
}

/**
 * Normalizes backend failures to STORE_UNAVAILABLE. Lookups are retried once; inserts
 * and updates are not.
 */
export function withUserStoreGuards(repo: UserRepository): UserRepository {
  return {
    async findByEmail(email) {
      try {
        return await repo.findByEmail(email);
      } catch (err) {
        if (isAppError(err)) throw err;
        try {
          return await repo.findByEmail(email);
        } catch (retryErr) {
          throw userStoreFailure('find_by_email', retryErr);
        }
      }
    },
    async createLocal(params) {
      try {
        return await repo.createLocal(params);
      } catch (err) {
        throw userStoreFailure('create_local', err);
      }
    },
    async createFederated(params) {
      try {
        return await repo.createFederated(params);
      } catch (err) {
        throw userStoreFailure('create_federated', err);
      }
    },
    async markOtpVerified(params) {
      try {
        await repo.markOtpVerified(params);
      } catch (err) {
        throw userStoreFailure('mark_otp_verified', err);
      }
    },
  };
}
