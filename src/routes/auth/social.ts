import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { parseSocialProvider } from '../../services/social/index.js';
import { startSocialLogin } from '../../services/social/social-login.service.js';
import type { RouteDeps } from '../deps.js';

const ParamsSchema = z.object({
  provider: z.string().min(1),
});

const QuerySchema = z
  .object({
    redirect_uri: z.string().url().optional(),
  })
  .passthrough();

export function registerAuthSocialRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.get('/auth/oauth/:provider/start', async (request, reply) => {
    const provider = parseSocialProvider(ParamsSchema.parse(request.params).provider);
    const { redirect_uri } = QuerySchema.parse(request.query);

    const { authorizationUrl, state } = await startSocialLogin(
      { provider, redirectUri: redirect_uri },
      deps,
    );

    reply.status(200).send({ provider, authorization_url: authorizationUrl, state });
  });
}
