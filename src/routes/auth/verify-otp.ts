import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { verifyEmailOtp } from '../../services/auth-verify-otp.service.js';
import type { RouteDeps } from '../deps.js';

const VerifyOtpBodySchema = z
  .object({
    email: z.string().trim().toLowerCase().email(),
    // Shape is not checked here; a malformed code is simply a mismatch.
    code: z.string().trim().min(1).max(32),
  })
  .strict();

export function registerAuthVerifyOtpRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.post('/auth/verify-otp', async (request, reply) => {
    const { email, code } = VerifyOtpBodySchema.parse(request.body);

    await verifyEmailOtp({ email, code }, deps);

    reply.status(200).send({ verified: true });
  });
}
