/**
 * The request-scoped identifiers a SessionManager works with. The HTTP layer
 * backs this with cookies; tests back it with plain fields.
 *
 * Reads must observe writes made earlier in the same request.
 */
export interface RequestSessionState {
  readSessionId(): Promise<string | null>;
  writeSessionId(sessionId: string): Promise<void>;

  readRememberToken(): Promise<string | null>;
  writeRememberToken(rememberToken: string): Promise<void>;
  clearRememberToken(): void;

  readReturnTo(): Promise<string | null>;
  writeReturnTo(location: string): Promise<void>;
  clearReturnTo(): void;

  /** Drops the session identifier and return-to location. The remember token is left alone. */
  reset(): void;
}
