import { describe, expect, it } from 'vitest';

import { accountStateAt, normalizeEmail } from '../../src/services/account-state.service.js';
import { federatedUser, localUser } from '../helpers/memory-user-repository.js';

const env = { ACCESS_TOKEN_EXPIRE_MINUTES: 30 };
const verifiedAt = new Date('2026-01-01T00:00:00.000Z');

function minutesAfter(minutes: number): Date {
  return new Date(verifiedAt.getTime() + minutes * 60_000);
}

describe('normalizeEmail', () => {
  it('trims and lowercases', () => {
    expect(normalizeEmail('  User@Example.COM ')).toBe('user@example.com');
  });

  it('rejects a blank email', () => {
    expect(() => normalizeEmail('   ')).toThrow('EMAIL_REQUIRED');
  });
});

describe('accountStateAt', () => {
  it('treats an inactive or unverified account as pending', () => {
    expect(accountStateAt(localUser({ isActive: false }), minutesAfter(1), env)).toBe(
      'pending_verification',
    );
    expect(accountStateAt(localUser({ isVerified: false }), minutesAfter(1), env)).toBe(
      'pending_verification',
    );
  });

  it('keeps a local account verified through one token lifetime', () => {
    const user = localUser({ lastOtpVerifiedAt: verifiedAt });
    expect(accountStateAt(user, minutesAfter(10), env)).toBe('verified');
    expect(accountStateAt(user, minutesAfter(30), env)).toBe('verified');
  });

  it('falls due for re-verification once the lifetime has passed', () => {
    const user = localUser({ lastOtpVerifiedAt: verifiedAt });
    expect(accountStateAt(user, minutesAfter(31), env)).toBe('reverification_due');
  });

  it('follows the configured token lifetime', () => {
    const user = localUser({ lastOtpVerifiedAt: verifiedAt });
    expect(accountStateAt(user, minutesAfter(31), { ACCESS_TOKEN_EXPIRE_MINUTES: 60 })).toBe(
      'verified',
    );
  });

  it('treats a verified local account without a timestamp as due', () => {
    expect(accountStateAt(localUser({ lastOtpVerifiedAt: null }), minutesAfter(1), env)).toBe(
      'reverification_due',
    );
  });

  it('never puts a federated account due', () => {
    expect(accountStateAt(federatedUser(), minutesAfter(60 * 24 * 365), env)).toBe('verified');
  });
});
