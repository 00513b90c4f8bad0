import type { FastifyInstance } from 'fastify';

import { PUBLIC_ERROR_MESSAGE } from '../config/constants.js';
import { registerAuthRoutes } from './auth/index.js';
import type { RouteDeps } from './deps.js';
import { registerHealthRoute } from './health/index.js';

export async function registerRoutes(app: FastifyInstance, deps?: RouteDeps): Promise<void> {
  registerHealthRoute(app);
  registerAuthRoutes(app, deps);

  app.setNotFoundHandler(async (_request, reply) => {
    // Keep 404s generic as well; avoid leaking route existence via message copy.
    reply.status(404).send({ error: PUBLIC_ERROR_MESSAGE });
  });
}
