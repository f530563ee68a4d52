/**
 * Authentication constants
 * Single source of truth for auth configuration
 */

// Cookie configuration
export const SESSION_COOKIE_NAME = 'latchkey.session';
export const REMEMBER_COOKIE_NAME = 'latchkey.remember';
export const RETURN_TO_COOKIE_NAME = 'latchkey.return-to';

// Browsers cap cookie lifetimes at 400 days, so "permanent" means this.
export const REMEMBER_COOKIE_MAX_AGE_SECONDS = 400 * 24 * 60 * 60;

// Signed token lifetimes
export const CONFIRMATION_TOKEN_TTL_SECONDS = 10 * 60;
export const PASSWORD_RESET_TOKEN_TTL_SECONDS = 10 * 60;

// Remember tokens: 32 bytes = 256 bits of entropy
export const REMEMBER_TOKEN_BYTES = 32;

// Password rules
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 72;

export const DEFAULT_MAILER_FROM = 'no-reply@example.com';
