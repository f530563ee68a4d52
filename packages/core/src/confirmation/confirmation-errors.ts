export class ConfirmationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfirmationError';
  }
}

/**
 * The pending email was claimed by another account between the change
 * request and the confirmation. Never says which account.
 */
export class EmailNoLongerAvailableError extends ConfirmationError {
  constructor() {
    super('That email address is no longer available.');
    this.name = 'EmailNoLongerAvailableError';
  }
}
