export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * Same error, same message, whether the email is unknown or the password is wrong.
 */
export class IncorrectCredentialsError extends AuthenticationError {
  constructor() {
    super('Incorrect email or password.');
    this.name = 'IncorrectCredentialsError';
  }
}

export class AccountUnconfirmedError extends AuthenticationError {
  constructor() {
    super('Please confirm your email address first.');
    this.name = 'AccountUnconfirmedError';
  }
}
