import nodemailer from 'nodemailer';

import type { Env } from '../config/env.js';
import { getEnv } from '../config/env.js';
import { authError } from '../utils/errors.js';
import { buildOtpCodeTemplate, type OtpEmailPurpose } from './email.templates.js';

export type EmailProviderName = 'disabled' | 'smtp';

export type EmailMessage = {
  to: string;
  subject: string;
  text: string;
  html?: string;
  from?: string;
  replyTo?: string;
};

export type EmailProvider = {
  name: EmailProviderName;
  send: (message: EmailMessage) => Promise<void>;
};

type EmailProviderDeps = {
  nodemailer?: typeof nodemailer;
};

function resolveProviderName(env: Env): EmailProviderName {
  return env.EMAIL_PROVIDER ?? 'disabled';
}

function safeEmailLog(env: Env, message: EmailMessage): void {
  // Email bodies carry one-time codes. Never log them in production.
  if (env.NODE_ENV === 'production') {
    console.info('[email]', { to: message.to, subject: message.subject });
    return;
  }

  if (env.NODE_ENV === 'test') return;

  console.info('[email:dev]', {
    to: message.to,
    subject: message.subject,
    text: message.text,
  });
}

function createDisabledProvider(env: Env): EmailProvider {
  return {
    name: 'disabled',
    async send(message) {
      safeEmailLog(env, message);
    },
  };
}

function createSmtpProvider(env: Env, deps?: EmailProviderDeps): EmailProvider {
  const nm = deps?.nodemailer ?? nodemailer;
  const host = env.SMTP_HOST;
  const port = env.SMTP_PORT ?? 587;

  // Don't fail server startup if SMTP is misconfigured; sends fail and callers report it.
  if (!host) {
    return {
      name: 'smtp',
      async send() {
        throw new Error('SMTP_HOST is required when EMAIL_PROVIDER=smtp');
      },
    };
  }

  const transporter = nm.createTransport({
    host,
    port,
    secure: env.SMTP_SECURE,
    auth: env.SMTP_USER && env.SMTP_PASSWORD ? { user: env.SMTP_USER, pass: env.SMTP_PASSWORD } : undefined,
    connectionTimeout: env.SMTP_TIMEOUT_MS,
    greetingTimeout: env.SMTP_TIMEOUT_MS,
    socketTimeout: env.SMTP_TIMEOUT_MS,
  });

  return {
    name: 'smtp',
    async send(message) {
      if (!message.from) {
        throw new Error('EMAIL_FROM is required when EMAIL_PROVIDER=smtp');
      }
      await transporter.sendMail({
        from: message.from,
        to: message.to,
        replyTo: message.replyTo,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    },
  };
}

export function createEmailProvider(env: Env, deps?: EmailProviderDeps): EmailProvider {
  const name = resolveProviderName(env);
  switch (name) {
    case 'smtp':
      return createSmtpProvider(env, deps);
    case 'disabled':
      return createDisabledProvider(env);
    default:
      throw new Error(`Unsupported EMAIL_PROVIDER: ${String(name)}`);
  }
}

let cachedProvider: EmailProvider | undefined;

export function getEmailProvider(): EmailProvider {
  cachedProvider ??= createEmailProvider(getEnv());
  return cachedProvider;
}

export type EmailDeps = {
  env?: Env;
  emailProvider?: EmailProvider;
};

async function dispatchEmail(message: EmailMessage, deps?: EmailDeps): Promise<void> {
  const provider = deps?.emailProvider ?? getEmailProvider();

  try {
    await provider.send(message);
  } catch (err) {
    // Only metadata; the body holds a live code.
    console.error('[email:error]', {
      provider: provider.name,
      to: message.to,
      subject: message.subject,
      providerErrorName: err instanceof Error ? err.name : 'UnknownError',
    });
    throw authError('DELIVERY_FAILED', 'EMAIL_SEND_FAILED');
  }
}

/**
 * Delivers a one-time code. Throws DELIVERY_FAILED when the provider rejects it; the
 * caller decides what happens to the code.
 */
export async function sendOtpEmail(
  params: { to: string; code: string; purpose: OtpEmailPurpose },
  deps?: EmailDeps,
): Promise<void> {
  const env = deps?.env ?? getEnv();
  const template = buildOtpCodeTemplate({
    code: params.code,
    expiresInSeconds: env.OTP_EXPIRE_SECONDS,
    purpose: params.purpose,
  });
  await dispatchEmail(
    {
      to: params.to,
      from: env.EMAIL_FROM,
      replyTo: env.EMAIL_REPLY_TO,
      subject: template.subject,
      text: template.text,
      html: template.html,
    },
    deps,
  );
}
