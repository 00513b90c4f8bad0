import type { FastifyRequest } from 'fastify';

import type { Env } from '../config/env.js';
import { verifyAccessToken } from '../services/access-token.service.js';
import { authError } from '../utils/errors.js';

export function parseBearerToken(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  const lower = trimmed.toLowerCase();
  if (!lower.startsWith('bearer ')) return null;

  const token = trimmed.slice('bearer '.length).trim();
  return token ? token : null;
}

declare module 'fastify' {
  interface FastifyRequest {
    accessTokenEmail?: string;
  }
}

/**
 * preHandler for routes that need a signed-in caller. Expired and otherwise invalid
 * tokens are reported separately so clients know whether to log in again.
 */
export function requireAccessToken(deps?: {
  env?: Env;
  now?: () => Date;
}): (request: FastifyRequest) => Promise<void> {
  return async (request: FastifyRequest): Promise<void> => {
    const token = parseBearerToken(request.headers.authorization);
    if (!token) {
      throw authError('TOKEN_INVALID', 'MISSING_ACCESS_TOKEN');
    }

    const res = await verifyAccessToken(token, deps);
    if (res.status === 'expired') throw authError('TOKEN_EXPIRED');
    if (res.status === 'invalid') throw authError('TOKEN_INVALID');

    request.accessTokenEmail = res.email;
  };
}
