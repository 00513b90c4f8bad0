export type AppErrorCode =
  | 'BAD_REQUEST'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'BAD_GATEWAY'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL';

/**
 * Failures the caller can act on (retry, resend, re-register). Anything else is
 * reported as a generic failure.
 */
export type AuthErrorReason =
  | 'DUPLICATE_EMAIL'
  | 'INVALID_CREDENTIALS'
  | 'NOT_VERIFIED'
  | 'NO_CODE_ISSUED'
  | 'CODE_EXPIRED'
  | 'CODE_MISMATCH'
  | 'TOKEN_INVALID'
  | 'TOKEN_EXPIRED'
  | 'STATE_INVALID'
  | 'STATE_EXPIRED'
  | 'PROVIDER_MISMATCH'
  | 'DELIVERY_FAILED'
  | 'UNKNOWN_PROVIDER'
  | 'STORE_UNAVAILABLE'
  | 'ACCOUNT_NOT_FOUND'
  | 'ALREADY_VERIFIED'
  | 'PROVIDER_NOT_CONFIGURED'
  | 'PROVIDER_EXCHANGE_FAILED'
  | 'PROVIDER_EMAIL_MISSING'
  | 'ACCOUNT_PROVIDER_CONFLICT';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly statusCode: number;
  public readonly reason: AuthErrorReason | null;

  public constructor(
    code: AppErrorCode,
    statusCode: number,
    message?: string,
    reason?: AuthErrorReason,
  ) {
    super(message ?? reason ?? code);
    this.code = code;
    this.statusCode = statusCode;
    this.reason = reason ?? null;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

const AUTH_ERROR_STATUS: Record<AuthErrorReason, [AppErrorCode, number]> = {
  DUPLICATE_EMAIL: ['BAD_REQUEST', 400],
  INVALID_CREDENTIALS: ['BAD_REQUEST', 400],
  NOT_VERIFIED: ['BAD_REQUEST', 400],
  NO_CODE_ISSUED: ['BAD_REQUEST', 400],
  CODE_EXPIRED: ['BAD_REQUEST', 400],
  CODE_MISMATCH: ['BAD_REQUEST', 400],
  TOKEN_INVALID: ['UNAUTHORIZED', 401],
  TOKEN_EXPIRED: ['UNAUTHORIZED', 401],
  STATE_INVALID: ['BAD_REQUEST', 400],
  STATE_EXPIRED: ['BAD_REQUEST', 400],
  PROVIDER_MISMATCH: ['BAD_REQUEST', 400],
  DELIVERY_FAILED: ['BAD_GATEWAY', 502],
  UNKNOWN_PROVIDER: ['NOT_FOUND', 404],
  STORE_UNAVAILABLE: ['SERVICE_UNAVAILABLE', 503],
  ACCOUNT_NOT_FOUND: ['NOT_FOUND', 404],
  ALREADY_VERIFIED: ['BAD_REQUEST', 400],
  PROVIDER_NOT_CONFIGURED: ['INTERNAL', 500],
  PROVIDER_EXCHANGE_FAILED: ['UNAUTHORIZED', 401],
  PROVIDER_EMAIL_MISSING: ['BAD_REQUEST', 400],
  ACCOUNT_PROVIDER_CONFLICT: ['BAD_REQUEST', 400],
};

/**
 * Builds the AppError for a user-facing auth failure. `message` stays internal (logs only).
 */
export function authError(reason: AuthErrorReason, message?: string): AppError {
  const [code, statusCode] = AUTH_ERROR_STATUS[reason];
  return new AppError(code, statusCode, message ?? reason, reason);
}
