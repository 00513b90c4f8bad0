import { z } from 'zod';
import dotenv from 'dotenv';

// Load local development environment variables from `.env` if present.
// In production, variables should be provided by the process environment.
dotenv.config();

const BooleanishSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().positive().default(3000),
  // Public origin used to build provider redirect URIs when no explicit one is configured.
  // If unset, we fall back to `http://${HOST}:${PORT}`.
  PUBLIC_BASE_URL: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  // Signs access tokens and OAuth state, and peppers one-time codes at rest.
  SECRET_KEY: z.string().min(1),
  // `iss` and `aud` of every token this service mints.
  AUTH_SERVICE_IDENTIFIER: z.string().min(1).default('otp-auth-service'),
  DATABASE_URL: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1).optional(),
  REDIS_KEY_PREFIX: z.string().default('otp-auth:'),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  OTP_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
  OTP_EXPIRE_SECONDS: z.coerce.number().int().positive().default(120),
  // How long an expired entry lingers so callers can be told "expired" rather than "absent".
  OTP_EXPIRED_RETENTION_SECONDS: z.coerce.number().int().min(0).default(300),
  OAUTH_STATE_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  OAUTH_STATE_SINGLE_USE: BooleanishSchema.default('true'),
  REGISTER_CONCEAL_EXISTING: BooleanishSchema.default('false'),
  EMAIL_PROVIDER: z.enum(['disabled', 'smtp']).optional(),
  EMAIL_FROM: z.string().min(1).optional(),
  EMAIL_REPLY_TO: z.string().min(1).optional(),
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.coerce.number().int().positive().optional(),
  SMTP_SECURE: BooleanishSchema.default('false'),
  SMTP_USER: z.string().min(1).optional(),
  SMTP_PASSWORD: z.string().min(1).optional(),
  SMTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  // Social providers (one set of credentials for the whole service).
  GOOGLE_CLIENT_ID: z.string().min(1).optional(),
  GOOGLE_CLIENT_SECRET: z.string().min(1).optional(),
  GOOGLE_REDIRECT_URI: z.string().min(1).optional(),
  GITHUB_CLIENT_ID: z.string().min(1).optional(),
  GITHUB_CLIENT_SECRET: z.string().min(1).optional(),
  GITHUB_REDIRECT_URI: z.string().min(1).optional(),
  PROVIDER_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Env = z.infer<typeof EnvSchema>;

let cachedEnv: Env | undefined;

export function parseEnv(input: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(input);
}

export function getEnv(): Env {
  cachedEnv ??= parseEnv(process.env);
  return cachedEnv;
}
