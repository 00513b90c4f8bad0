import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';

import { PUBLIC_ERROR_MESSAGE } from '../config/constants.js';
import { isAppError } from '../utils/errors.js';

const INVALID_REQUEST = 'INVALID_REQUEST';

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    // Internal logs can contain specifics; responses carry only the reason code.
    request.log.error({ err: error }, 'request failed');

    if (error instanceof ZodError) {
      reply.status(400).send({ error: INVALID_REQUEST });
      return;
    }

    if (isAppError(error)) {
      reply.status(error.statusCode).send({ error: error.reason ?? PUBLIC_ERROR_MESSAGE });
      return;
    }

    // Fastify's own 4xx (malformed JSON, wrong content type, oversized body).
    if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
      reply.status(400).send({ error: INVALID_REQUEST });
      return;
    }

    reply.status(500).send({ error: PUBLIC_ERROR_MESSAGE });
  });
}
