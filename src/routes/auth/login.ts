import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { TOKEN_TYPE } from '../../config/constants.js';
import { loginWithEmailPassword } from '../../services/auth-login.service.js';
import type { RouteDeps } from '../deps.js';

const LoginBodySchema = z
  .object({
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(1),
  })
  .strict();

export function registerAuthLoginRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.post('/auth/login', async (request, reply) => {
    const { email, password } = LoginBodySchema.parse(request.body);

    const result = await loginWithEmailPassword({ email, password }, deps);

    if (result.status === 'otp_required') {
      // A fresh code is on its way; the client verifies it and logs in again.
      reply.status(200).send({ otp_required: true });
      return;
    }

    reply.status(200).send({
      access_token: result.accessToken,
      token_type: TOKEN_TYPE,
      expires_in: result.expiresInSeconds,
    });
  });
}
