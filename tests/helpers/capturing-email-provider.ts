import type { EmailMessage, EmailProvider } from '../../src/services/email.service.js';

export type CapturingEmailProvider = EmailProvider & {
  sent: EmailMessage[];
  failNext: () => void;
  lastCodeFor: (to: string) => string;
};

export function createCapturingEmailProvider(): CapturingEmailProvider {
  const sent: EmailMessage[] = [];
  let shouldFail = false;

  return {
    name: 'disabled',
    sent,
    async send(message) {
      if (shouldFail) {
        shouldFail = false;
        throw new Error('mailbox unavailable');
      }
      sent.push(message);
    },
    failNext() {
      shouldFail = true;
    },
    lastCodeFor(to) {
      const message = [...sent].reverse().find((m) => m.to === to);
      const code = message?.text.match(/^\d+$/m)?.[0];
      if (!code) throw new Error(`no code was mailed to ${to}`);
      return code;
    },
  };
}
