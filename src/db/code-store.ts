import type { Redis } from 'ioredis';

import { authError, isAppError } from '../utils/errors.js';

/**
 * Key-value store with per-key TTL. Entries past their TTL are indistinguishable
 * from entries that were never written.
 */
export type CodeStore = {
  set: (key: string, value: string, ttlSeconds: number) => Promise<void>;
  get: (key: string) => Promise<string | null>;
  delete: (key: string) => Promise<void>;
  // Atomic: removes the key only while it still holds `expected`; reports whether it did.
  deleteIfMatch: (key: string, expected: string) => Promise<boolean>;
  // Atomic: writes only when the key is absent; reports whether it did.
  setIfAbsent: (key: string, value: string, ttlSeconds: number) => Promise<boolean>;
};

type MemoryEntry = {
  value: string;
  expiresAtMs: number;
};

export function createMemoryCodeStore(opts?: { now?: () => number }): CodeStore {
  const now = opts?.now ?? Date.now;
  const entries = new Map<string, MemoryEntry>();

  // Lazy expiry: an entry is evicted the first time it is touched after its TTL.
  const live = (key: string): MemoryEntry | null => {
    const entry = entries.get(key);
    if (!entry) return null;
    if (now() >= entry.expiresAtMs) {
      entries.delete(key);
      return null;
    }
    return entry;
  };

  return {
    async set(key, value, ttlSeconds) {
      entries.set(key, { value, expiresAtMs: now() + ttlSeconds * 1000 });
    },
    async get(key) {
      return live(key)?.value ?? null;
    },
    async delete(key) {
      entries.delete(key);
    },
    async deleteIfMatch(key, expected) {
      const entry = live(key);
      if (!entry || entry.value !== expected) return false;
      entries.delete(key);
      return true;
    },
    async setIfAbsent(key, value, ttlSeconds) {
      if (live(key)) return false;
      entries.set(key, { value, expiresAtMs: now() + ttlSeconds * 1000 });
      return true;
    },
  };
}

const DELETE_IF_MATCH_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export function createRedisCodeStore(redis: Redis, opts?: { keyPrefix?: string }): CodeStore {
  const prefix = opts?.keyPrefix ?? '';
  const k = (key: string): string => `${prefix}${key}`;

  return {
    async set(key, value, ttlSeconds) {
      await redis.set(k(key), value, 'EX', ttlSeconds);
    },
    async get(key) {
      return await redis.get(k(key));
    },
    async delete(key) {
      await redis.del(k(key));
    },
    async deleteIfMatch(key, expected) {
      const removed = await redis.eval(DELETE_IF_MATCH_SCRIPT, 1, k(key), expected);
      return removed === 1;
    },
    async setIfAbsent(key, value, ttlSeconds) {
      const res = await redis.set(k(key), value, 'EX', ttlSeconds, 'NX');
      return res === 'OK';
    },
  };
}

function storeFailure(op: string, err: unknown): Error {
  if (isAppError(err)) return err;
  console.error('[code-store:error]', {
    op,
    errorName: err instanceof Error ? err.name : 'UnknownError',
  });
  return authError('STORE_UNAVAILABLE', `CODE_STORE_${op.toUpperCase()}_FAILED`);
}

/**
 * Normalizes backend failures to STORE_UNAVAILABLE. Reads are retried once; writes are
 * never retried, so a lost invalidation is reported instead of assumed.
 */
export function withStoreGuards(store: CodeStore): CodeStore {
  return {
    async set(key, value, ttlSeconds) {
      try {
        await store.set(key, value, ttlSeconds);
      } catch (err) {
        throw storeFailure('set', err);
      }
    },
    async get(key) {
      try {
        return await store.get(key);
      } catch {
        try {
          return await store.get(key);
        } catch (err) {
          throw storeFailure('get', err);
        }
      }
    },
    async delete(key) {
      try {
        await store.delete(key);
      } catch (err) {
        throw storeFailure('delete', err);
      }
    },
    async deleteIfMatch(key, expected) {
      try {
        return await store.deleteIfMatch(key, expected);
      } catch (err) {
        throw storeFailure('delete_if_match', err);
      }
    },
    async setIfAbsent(key, value, ttlSeconds) {
      try {
        return await store.setIfAbsent(key, value, ttlSeconds);
      } catch (err) {
        throw storeFailure('set_if_absent', err);
      }
    },
  };
}
