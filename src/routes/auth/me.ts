import type { FastifyInstance } from 'fastify';

import { requireAccessToken } from '../../middleware/access-token.js';
import { getAccountSummary } from '../../services/auth-me.service.js';
import type { RouteDeps } from '../deps.js';

export function registerAuthMeRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.get(
    '/auth/me',
    {
      preHandler: [requireAccessToken(deps)],
    },
    async (request, reply) => {
      const email = request.accessTokenEmail;
      if (!email) {
        // requireAccessToken sets this on success.
        throw new Error('missing request.accessTokenEmail');
      }

      const account = await getAccountSummary({ email }, deps);
      reply.status(200).send({
        email: account.email,
        auth_provider: account.authProvider,
        is_verified: account.isVerified,
      });
    },
  );
}
