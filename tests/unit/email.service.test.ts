import { afterEach, describe, expect, it, vi } from 'vitest';

import { createEmailProvider, sendOtpEmail } from '../../src/services/email.service.js';
import { createCapturingEmailProvider } from '../helpers/capturing-email-provider.js';
import { testEnv } from '../helpers/test-env.js';

describe('createEmailProvider', () => {
  it('defaults to the disabled provider when EMAIL_PROVIDER is unset', async () => {
    const provider = createEmailProvider(testEnv({ EMAIL_PROVIDER: undefined }));
    expect(provider.name).toBe('disabled');
    await expect(
      provider.send({ to: 't@example.com', subject: 's', text: 'hello' }),
    ).resolves.toBeUndefined();
  });

  it('creates an smtp provider that errors when SMTP_HOST is missing', async () => {
    const provider = createEmailProvider(
      testEnv({ EMAIL_PROVIDER: 'smtp', EMAIL_FROM: 'noreply@example.com' }),
    );
    await expect(
      provider.send({ to: 't@example.com', from: 'noreply@example.com', subject: 's', text: 'hello' }),
    ).rejects.toThrow(/SMTP_HOST/);
  });

  it('creates an smtp provider that sends mail via nodemailer with bounded timeouts', async () => {
    const sendMail = vi.fn(async () => ({ messageId: 'm1' }));
    const createTransport = vi.fn(() => ({ sendMail }));
    const nodemailerStub = { createTransport };

    const env = testEnv({
      EMAIL_PROVIDER: 'smtp',
      EMAIL_FROM: 'noreply@example.com',
      EMAIL_REPLY_TO: 'support@example.com',
      SMTP_HOST: 'smtp.example.com',
      SMTP_PORT: 2525,
      SMTP_SECURE: true,
      SMTP_USER: 'user',
      SMTP_PASSWORD: 'test-password',
      SMTP_TIMEOUT_MS: 4000,
    });

    const provider = createEmailProvider(env, {
      // Minimal stub; we only need createTransport and the returned sendMail.
      nodemailer: nodemailerStub as unknown as typeof import('nodemailer'),
    });

    await provider.send({
      to: 'to@example.com',
      from: env.EMAIL_FROM,
      replyTo: env.EMAIL_REPLY_TO,
      subject: 'Subject',
      text: 'Text',
      html: '<p>Text</p>',
    });

    expect(createTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 2525,
      secure: true,
      auth: { user: 'user', pass: 'test-password' },
      connectionTimeout: 4000,
      greetingTimeout: 4000,
      socketTimeout: 4000,
    });

    expect(sendMail).toHaveBeenCalledWith({
      from: 'noreply@example.com',
      to: 'to@example.com',
      replyTo: 'support@example.com',
      subject: 'Subject',
      text: 'Text',
      html: '<p>Text</p>',
    });
  });

  it('requires EMAIL_FROM for smtp', async () => {
    const provider = createEmailProvider(
      testEnv({ EMAIL_PROVIDER: 'smtp', SMTP_HOST: 'smtp.example.com' }),
      {
        nodemailer: { createTransport: vi.fn(() => ({ sendMail: vi.fn() })) } as unknown as typeof import('nodemailer'),
      },
    );
    await expect(
      provider.send({ to: 't@example.com', subject: 's', text: 'hello' }),
    ).rejects.toThrow(/EMAIL_FROM/);
  });
});

describe('sendOtpEmail', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('mails the code with the configured sender', async () => {
    const emailProvider = createCapturingEmailProvider();
    const env = testEnv({ EMAIL_FROM: 'noreply@example.com', EMAIL_REPLY_TO: 'help@example.com' });

    await sendOtpEmail(
      { to: 'user@example.com', code: '424242', purpose: 'registration' },
      { env, emailProvider },
    );

    expect(emailProvider.sent).toHaveLength(1);
    expect(emailProvider.sent[0]).toMatchObject({
      to: 'user@example.com',
      from: 'noreply@example.com',
      replyTo: 'help@example.com',
      subject: 'Your verification code',
    });
    expect(emailProvider.lastCodeFor('user@example.com')).toBe('424242');
  });

  it('reports DELIVERY_FAILED without logging the code', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const emailProvider = createCapturingEmailProvider();
    emailProvider.failNext();

    await expect(
      sendOtpEmail(
        { to: 'user@example.com', code: '424242', purpose: 'resend' },
        { env: testEnv(), emailProvider },
      ),
    ).rejects.toMatchObject({ reason: 'DELIVERY_FAILED', statusCode: 502 });

    expect(errorSpy).toHaveBeenCalledWith('[email:error]', {
      provider: 'disabled',
      to: 'user@example.com',
      subject: 'Your verification code',
      providerErrorName: 'Error',
    });
  });
});
