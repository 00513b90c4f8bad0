import type { FastifyInstance } from 'fastify';

import type { RouteDeps } from '../deps.js';
import { registerAuthCallbackRoute } from './callback.js';
import { registerAuthLoginRoute } from './login.js';
import { registerAuthMeRoute } from './me.js';
import { registerAuthRegisterRoute } from './register.js';
import { registerAuthResendOtpRoute } from './resend-otp.js';
import { registerAuthSocialRoute } from './social.js';
import { registerAuthVerifyOtpRoute } from './verify-otp.js';

export function registerAuthRoutes(app: FastifyInstance, deps?: RouteDeps): void {
  registerAuthRegisterRoute(app, deps);
  registerAuthVerifyOtpRoute(app, deps);
  registerAuthResendOtpRoute(app, deps);
  registerAuthLoginRoute(app, deps);
  registerAuthSocialRoute(app, deps);
  registerAuthCallbackRoute(app, deps);
  registerAuthMeRoute(app, deps);
}
