import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { registerWithEmailPassword } from '../../services/auth-register.service.js';
import type { RouteDeps } from '../deps.js';

const SUCCESS_MESSAGE = 'We sent a verification code to your email';

const RegisterBodySchema = z
  .object({
    email: z.string().trim().toLowerCase().email(),
    password: z.string().min(1),
  })
  .strict();

export function registerAuthRegisterRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.post('/auth/register', async (request, reply) => {
    const { email, password } = RegisterBodySchema.parse(request.body);

    await registerWithEmailPassword({ email, password }, deps);

    reply.status(202).send({ message: SUCCESS_MESSAGE });
  });
}
