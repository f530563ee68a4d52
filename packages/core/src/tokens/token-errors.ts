/**
 * Token Domain Errors
 *
 * Every token failure reaches callers as the same error; the specific reason
 * only goes to the audit trail.
 */

export class TokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenError';
  }
}

export class InvalidOrExpiredTokenError extends TokenError {
  constructor() {
    super('This link is invalid or has expired.');
    this.name = 'InvalidOrExpiredTokenError';
  }
}
