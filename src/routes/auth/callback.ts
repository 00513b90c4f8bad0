import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { TOKEN_TYPE } from '../../config/constants.js';
import { parseSocialProvider } from '../../services/social/index.js';
import { completeSocialLogin } from '../../services/social/social-login.service.js';
import type { RouteDeps } from '../deps.js';

const ParamsSchema = z.object({
  provider: z.string().min(1),
});

const BodySchema = z
  .object({
    code: z.string().min(1),
    state: z.string().min(1),
    redirect_uri: z.string().url().optional(),
  })
  .strict();

export function registerAuthCallbackRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.post('/auth/oauth/:provider/callback', async (request, reply) => {
    // Unknown provider is reported before the body is looked at.
    const provider = parseSocialProvider(ParamsSchema.parse(request.params).provider);
    const { code, state, redirect_uri } = BodySchema.parse(request.body);

    const { accessToken, expiresInSeconds } = await completeSocialLogin(
      { provider, code, state, redirectUri: redirect_uri },
      deps,
    );

    reply.status(200).send({
      access_token: accessToken,
      token_type: TOKEN_TYPE,
      expires_in: expiresInSeconds,
      provider,
    });
  });
}
