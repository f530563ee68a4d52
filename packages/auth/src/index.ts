/**
 * @latchkey/auth
 *
 * Authentication primitives
 * - Password hashing/verification
 * - Signed, purpose-bound tokens and sealed cookie values
 * - Auth constants (cookie names, token lifetimes, password rules)
 * - Auth events and the mailer that delivers token links
 *
 * Account, session and confirmation flows live in @latchkey/core.
 */

// Password utilities
export { hashPassword, verifyPassword } from './password.js';

// Tokens
export { generateSecureToken, deriveKey } from './secure-token.js';
export { SignedTokenCodec, TOKEN_PURPOSES, TOKEN_TTL_SECONDS } from './signed-token.js';
export type {
  IssueTokenOptions,
  SignedTokenCodecOptions,
  SignedTokenFailureReason,
  SignedTokenVerification,
  TokenPurpose,
} from './signed-token.js';
export { sealValue, unsealValue } from './sealed-value.js';

// Constants
export {
  SESSION_COOKIE_NAME,
  REMEMBER_COOKIE_NAME,
  RETURN_TO_COOKIE_NAME,
  REMEMBER_COOKIE_MAX_AGE_SECONDS,
  CONFIRMATION_TOKEN_TTL_SECONDS,
  PASSWORD_RESET_TOKEN_TTL_SECONDS,
  REMEMBER_TOKEN_BYTES,
  PASSWORD_MIN_LENGTH,
  PASSWORD_MAX_LENGTH,
  DEFAULT_MAILER_FROM,
} from './constants.js';

// Events
export { AuthEventEmitter, authEvents } from './events.js';
export type { AuthEvent, AuthEventHandler, AuthEventInput, AuthEventSink, AuthEventType } from './events.js';

// Mail
export {
  LoggingAuthMailer,
  MailDeliveryError,
  ResendAuthMailer,
  buildTokenLink,
  getRecipientLogId,
  recipientAddressFor,
} from './email.js';
export type { AuthMailer, AuthMailMessage, AuthMailRecipient, ResendAuthMailerOptions } from './email.js';
