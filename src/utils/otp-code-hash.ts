import { createHmac, timingSafeEqual } from 'node:crypto';

export function hashOtpCode(code: string, pepper: string): string {
  // Keyed with the service secret; the store never holds a plain code.
  return createHmac('sha256', pepper).update(code, 'utf8').digest('hex');
}

export function otpCodeHashesEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
