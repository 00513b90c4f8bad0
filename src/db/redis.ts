import { Redis } from 'ioredis';

import { getEnv } from '../config/env.js';
import {
  createMemoryCodeStore,
  createRedisCodeStore,
  withStoreGuards,
  type CodeStore,
} from './code-store.js';

let redis: Redis | undefined;
let codeStore: CodeStore | undefined;

export function getRedis(): Redis {
  if (redis) return redis;

  const { REDIS_URL, REDIS_COMMAND_TIMEOUT_MS } = getEnv();
  if (!REDIS_URL) {
    throw new Error('Missing required environment variables: REDIS_URL');
  }
  redis = new Redis(REDIS_URL, {
    lazyConnect: true,
    commandTimeout: REDIS_COMMAND_TIMEOUT_MS,
    // Fail fast; the code store layer decides what may be retried.
    maxRetriesPerRequest: 1,
  });
  redis.on('error', (err: Error) => {
    console.error('[redis:error]', { errorName: err.name });
  });
  return redis;
}

export async function connectRedis(): Promise<void> {
  await getRedis().connect();
}

export async function disconnectRedis(): Promise<void> {
  codeStore = undefined;
  if (!redis) return;
  await redis.quit();
  redis = undefined;
}

/**
 * Redis-backed when REDIS_URL is set, otherwise a process-local map.
 */
export function getCodeStore(): CodeStore {
  if (codeStore) return codeStore;

  const env = getEnv();
  codeStore = env.REDIS_URL
    ? withStoreGuards(createRedisCodeStore(getRedis(), { keyPrefix: env.REDIS_KEY_PREFIX }))
    : withStoreGuards(createMemoryCodeStore());
  return codeStore;
}
