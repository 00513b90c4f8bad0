import fastify, { type FastifyInstance } from 'fastify';

import { getEnv } from './config/env.js';
import { connectPostgres, disconnectPostgres } from './db/postgres.js';
import { connectRedis, disconnectRedis } from './db/redis.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import type { RouteDeps } from './routes/deps.js';
import { registerRoutes } from './routes/index.js';

export type AppDeps = RouteDeps;

export async function createApp(deps?: AppDeps): Promise<FastifyInstance> {
  const env = deps?.env ?? getEnv();

  const app = fastify({
    // Never log bearer tokens, codes or other secrets. Automatic request logging is off
    // so query strings (redirect URIs, provider state) are not persisted either.
    disableRequestLogging: true,
    logger:
      env.NODE_ENV === 'test'
        ? false
        : {
            level: env.LOG_LEVEL,
            redact: {
              paths: [
                'req.headers.authorization',
                'req.headers.cookie',
                // Redact token-like keys if we ever log structured objects containing them.
                'authorization',
                'headers.authorization',
                'headers.cookie',
                'password',
                'passwordHash',
                'code',
                'token',
                'state',
                'access_token',
                'accessToken',
                'client_secret',
                'clientSecret',
                'SECRET_KEY',
              ],
              censor: '[REDACTED]',
            },
          },
  });

  // Injected collaborators (tests, embedding) replace the configured backends entirely.
  if (!deps?.users) {
    if (env.DATABASE_URL) {
      await connectPostgres();
      app.addHook('onClose', async () => {
        await disconnectPostgres();
      });
    } else {
      app.log.warn('DATABASE_URL not set; database is disabled');
    }
  }

  if (!deps?.codes) {
    if (env.REDIS_URL) {
      await connectRedis();
      app.addHook('onClose', async () => {
        await disconnectRedis();
      });
    } else {
      app.log.warn('REDIS_URL not set; one-time codes are kept in process memory');
    }
  }

  registerErrorHandler(app);
  await registerRoutes(app, { ...deps, env });

  return app;
}
