export const PUBLIC_ERROR_MESSAGE = 'Request failed';

export const TOKEN_TYPE = 'bearer';

// Ephemeral store key namespaces.
export const OTP_KEY_PREFIX = 'otp:';
export const OAUTH_NONCE_KEY_PREFIX = 'oauth-nonce:';

// Signed token `typ` claims; a token minted for one purpose never verifies for another.
export const ACCESS_TOKEN_TYPE = 'access';
export const OAUTH_STATE_TOKEN_TYPE = 'oauth_state';
