import pg from 'pg';

import { getEnv } from '../config/env.js';
import { AppError } from '../utils/errors.js';
import {
  createPgUserRepository,
  withUserStoreGuards,
  type UserRepository,
} from './user-repository.js';

const { Pool } = pg;

let pool: pg.Pool | undefined;

export function getPool(): pg.Pool {
  if (pool) return pool;

  const { DATABASE_URL } = getEnv();
  if (!DATABASE_URL) {
    // Missing DB is an internal configuration error; keep it generic.
    throw new AppError('INTERNAL', 500, 'DATABASE_DISABLED');
  }
  pool = new Pool({
    connectionString: DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 5_000,
    query_timeout: 5_000,
  });
  return pool;
}

export async function connectPostgres(): Promise<void> {
  const client = await getPool().connect();
  client.release();
}

export async function disconnectPostgres(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = undefined;
}

export function getUserRepository(): UserRepository {
  return withUserStoreGuards(createPgUserRepository(getPool()));
}
