import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { resendEmailOtp } from '../../services/auth-resend-otp.service.js';
import type { RouteDeps } from '../deps.js';

const SUCCESS_MESSAGE = 'We sent a new verification code to your email';

const ResendOtpBodySchema = z
  .object({
    email: z.string().trim().toLowerCase().email(),
  })
  .strict();

export function registerAuthResendOtpRoute(app: FastifyInstance, deps?: RouteDeps): void {
  app.post('/auth/resend-otp', async (request, reply) => {
    const { email } = ResendOtpBodySchema.parse(request.body);

    await resendEmailOtp({ email }, deps);

    reply.status(200).send({ message: SUCCESS_MESSAGE });
  });
}
