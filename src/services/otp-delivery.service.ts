import type { OtpEmailPurpose } from './email.templates.js';
import { sendOtpEmail, type EmailDeps } from './email.service.js';
import { invalidateOtp, issueOtp, type OtpDeps } from './otp.service.js';

export type OtpDeliveryDeps = OtpDeps &
  EmailDeps & {
    sendOtpEmail?: typeof sendOtpEmail;
  };

/**
 * Issues a fresh code for `email` and mails it. If the mail cannot be delivered the
 * code is withdrawn before DELIVERY_FAILED propagates, so no undeliverable code stays live.
 */
export async function issueAndDeliverOtp(
  params: { email: string; purpose: OtpEmailPurpose },
  deps?: OtpDeliveryDeps,
): Promise<void> {
  const code = await issueOtp({ email: params.email }, deps);

  try {
    await (deps?.sendOtpEmail ?? sendOtpEmail)(
      { to: params.email, code, purpose: params.purpose },
      deps,
    );
  } catch (err) {
    await invalidateOtp({ email: params.email }, deps);
    throw err;
  }
}
