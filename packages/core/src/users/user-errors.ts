/**
 * User Domain Errors
 *
 * Custom error classes for user-related business rule violations.
 */

export type ValidationDetails = Record<string, string[]>;

export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UserError';
  }
}

/**
 * Field-level input problems. Recoverable; the caller shows `details`.
 */
export class ValidationFailedError extends UserError {
  constructor(public readonly details: ValidationDetails) {
    super(`Validation failed: ${Object.keys(details).join(', ')}`);
    this.name = 'ValidationFailedError';
  }
}

export class DuplicateEmailError extends ValidationFailedError {
  constructor() {
    super({ email: ['has already been taken'] });
    this.name = 'DuplicateEmailError';
  }
}

export class UserNotFoundError extends UserError {
  constructor(userId: string) {
    super(`User not found: ${userId}`);
    this.name = 'UserNotFoundError';
  }
}
