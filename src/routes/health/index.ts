import type { FastifyInstance } from 'fastify';

// Liveness only; it does not touch Postgres or Redis.
export function registerHealthRoute(app: FastifyInstance): void {
  app.get('/health', async (_request, reply) => {
    reply.status(200).send({ ok: true });
  });
}
