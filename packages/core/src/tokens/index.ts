export { TokenError, InvalidOrExpiredTokenError } from './token-errors.js';
export { rejectToken, verifyTokenOrReject } from './token-verification.js';
export type { TokenRejectionReason, VerifiedToken } from './token-verification.js';
