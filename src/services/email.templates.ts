type EmailTemplate = {
  subject: string;
  text: string;
  html: string;
};

export type OtpEmailPurpose = 'registration' | 'resend' | 'login';

function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

export function codeTtlMinutes(expiresInSeconds: number): number {
  return Math.max(1, Math.round(expiresInSeconds / 60));
}

function headingFor(purpose: OtpEmailPurpose): string {
  switch (purpose) {
    case 'registration':
      return 'Confirm your email';
    case 'resend':
      return 'Your new verification code';
    case 'login':
      return 'Confirm it is you';
  }
}

export function buildOtpCodeTemplate(params: {
  code: string;
  expiresInSeconds: number;
  purpose: OtpEmailPurpose;
}): EmailTemplate {
  const minutes = codeTtlMinutes(params.expiresInSeconds);
  const lifetime = `${minutes} ${minutes === 1 ? 'minute' : 'minutes'}`;
  const heading = headingFor(params.purpose);
  const escapedCode = escapeHtml(params.code);

  // The subject never carries the code; it shows up in notification previews.
  const subject = 'Your verification code';
  const text = [
    heading,
    '',
    'Enter this code to continue:',
    params.code,
    '',
    `This code expires in ${lifetime} and can only be used once.`,
    'Requesting a new code cancels this one.',
    '',
    'If you did not request this, you can ignore this email.',
  ].join('\n');

  // Inline CSS only; email clients strip external styles.
  const html = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(subject)}</title>
  </head>
  <body style="margin:0;padding:0;background:#f6f7fb;">
    <table role="presentation" cellpadding="0" cellspacing="0" width="100%" style="background:#f6f7fb;padding:24px 12px;">
      <tr>
        <td align="center">
          <table role="presentation" cellpadding="0" cellspacing="0" width="100%" style="max-width:560px;background:#ffffff;border-radius:12px;overflow:hidden;border:1px solid #e8eaf0;">
            <tr>
              <td style="padding:24px 24px 8px 24px;font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial,sans-serif;color:#111827;">
                <h1 style="margin:0;font-size:20px;line-height:28px;">${escapeHtml(heading)}</h1>
              </td>
            </tr>
            <tr>
              <td style="padding:0 24px 16px 24px;font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial,sans-serif;color:#374151;font-size:14px;line-height:22px;">
                Enter this code to continue.
              </td>
            </tr>
            <tr>
              <td align="center" style="padding:0 24px 20px 24px;">
                <div style="display:inline-block;background:#f3f4f6;color:#111827;font-family:ui-monospace,SFMono-Regular,Menlo,Monaco,Consolas,monospace;font-size:28px;line-height:36px;letter-spacing:6px;padding:12px 20px;border-radius:10px;">${escapedCode}</div>
              </td>
            </tr>
            <tr>
              <td style="padding:0 24px 16px 24px;font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial,sans-serif;color:#6b7280;font-size:12px;line-height:18px;">
                This code expires in ${lifetime} and can only be used once. Requesting a new code cancels this one.
              </td>
            </tr>
            <tr>
              <td style="padding:0 24px 24px 24px;font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial,sans-serif;color:#6b7280;font-size:12px;line-height:18px;">
                If you did not request this, you can ignore this email.
              </td>
            </tr>
          </table>
        </td>
      </tr>
    </table>
  </body>
</html>`;

  return { subject, text, html };
}
