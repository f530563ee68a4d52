export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionError';
  }
}

export class AuthenticationRequiredError extends SessionError {
  constructor() {
    super('Authentication required');
    this.name = 'AuthenticationRequiredError';
  }
}

/**
 * Raised for ids that are missing or belong to another user; the two cases
 * are indistinguishable to the caller.
 */
export class ActiveSessionNotFoundError extends SessionError {
  constructor(sessionId: string) {
    super(`Active session not found: ${sessionId}`);
    this.name = 'ActiveSessionNotFoundError';
  }
}
