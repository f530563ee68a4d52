/**
 * Session Lifecycle Manager
 *
 * Built once per request around that request's session state. Resolves who
 * is signed in (session id first, then the remember token), creates and
 * destroys ActiveSessions, and owns the anti-fixation and revocation rules.
 */

import { generateSecureToken, type AuthEventSink } from '@latchkey/auth';
import type { User } from '../users/user-types.js';
import { ActiveSessionNotFoundError, AuthenticationRequiredError } from './session-errors.js';
import type { ActiveSessionRepository } from './session-repository.js';
import type { RequestSessionState } from './session-state.js';
import type {
  ActiveSession,
  ActiveSessionSummary,
  ActiveSessionWithUser,
  RequestMetadata,
} from './session-types.js';

export interface SessionManagerOptions {
  sessions: ActiveSessionRepository;
  state: RequestSessionState;
  authEvents: AuthEventSink;
  generateRememberToken?: () => string;
}

export class SessionManager {
  private readonly sessions: ActiveSessionRepository;
  private readonly state: RequestSessionState;
  private readonly authEvents: AuthEventSink;
  private readonly generateRememberToken: () => string;

  // Memoized resolution for this request; shared by concurrent callers.
  private resolution: Promise<ActiveSessionWithUser | null> | null = null;

  constructor(options: SessionManagerOptions) {
    this.sessions = options.sessions;
    this.state = options.state;
    this.authEvents = options.authEvents;
    this.generateRememberToken = options.generateRememberToken ?? (() => generateSecureToken());
  }

  async resolveCurrentUser(): Promise<User | null> {
    return (await this.resolve())?.user ?? null;
  }

  async currentActiveSession(): Promise<ActiveSession | null> {
    return (await this.resolve())?.session ?? null;
  }

  async isAuthenticated(): Promise<boolean> {
    return (await this.resolve()) !== null;
  }

  /**
   * @throws AuthenticationRequiredError when nobody is signed in
   */
  async requireAuthenticated(): Promise<User> {
    return (await this.requireResolved()).user;
  }

  /**
   * Sign `user` in on this device. All prior request state is dropped first,
   * so the session identifier after login is always new.
   */
  async login(user: User, metadata: RequestMetadata): Promise<ActiveSession> {
    this.state.reset();
    this.resolution = Promise.resolve(null);

    const session = await this.sessions.create({
      userId: user.id,
      rememberToken: this.generateRememberToken(),
      userAgent: metadata.userAgent,
      ipAddress: metadata.ipAddress,
    });

    await this.state.writeSessionId(session.id);
    this.resolution = Promise.resolve({ session, user });

    this.authEvents.emit({
      type: 'session.created',
      userId: user.id,
      ip: metadata.ipAddress ?? undefined,
      metadata: { activeSessionId: session.id, userAgent: metadata.userAgent },
    });

    return session;
  }

  /**
   * Resolves the current session before clearing state, then deletes it.
   */
  async logout(): Promise<void> {
    const current = await this.resolve();

    this.state.reset();
    this.resolution = Promise.resolve(null);

    if (!current) {
      return;
    }

    await this.sessions.delete(current.session.id);
    this.authEvents.emit({
      type: 'user.logout',
      userId: current.user.id,
      metadata: { activeSessionId: current.session.id },
    });
  }

  /**
   * Persist sign-in across browser restarts for this device.
   */
  async remember(session: ActiveSession): Promise<void> {
    await this.state.writeRememberToken(session.rememberToken);
  }

  /**
   * Drops the remember-me cookie only; the ActiveSession row stays.
   */
  forgetActiveSession(): void {
    this.state.clearRememberToken();
  }

  async listActiveSessions(): Promise<ActiveSessionSummary[]> {
    const current = await this.requireResolved();
    const sessions = await this.sessions.listForUser(current.user.id);

    return sessions.map((session) => ({
      id: session.id,
      userAgent: session.userAgent,
      ipAddress: session.ipAddress,
      createdAt: session.createdAt.toISOString(),
      isCurrent: session.id === current.session.id,
    }));
  }

  /**
   * Revoke one of the current user's devices. Revoking the device making this
   * request leaves the rest of the request anonymous.
   */
  async revokeActiveSession(sessionId: string): Promise<void> {
    const current = await this.requireResolved();

    const target = await this.sessions.findByIdForUser(sessionId, current.user.id);
    if (!target) {
      throw new ActiveSessionNotFoundError(sessionId);
    }

    await this.sessions.delete(target.id);

    if (target.id === current.session.id) {
      this.forgetActiveSession();
      this.state.reset();
      this.resolution = Promise.resolve(null);
    }

    this.authEvents.emit({
      type: 'session.revoked',
      userId: current.user.id,
      metadata: { activeSessionId: target.id, current: target.id === current.session.id },
    });
  }

  /**
   * Sign out everywhere, this device included.
   */
  async revokeAllActiveSessions(): Promise<number> {
    const current = await this.requireResolved();

    const revoked = await this.sessions.deleteAllForUser(current.user.id);

    this.forgetActiveSession();
    this.state.reset();
    this.resolution = Promise.resolve(null);

    this.authEvents.emit({
      type: 'session.revoked_all',
      userId: current.user.id,
      metadata: { revoked },
    });

    return revoked;
  }

  async storeLocation(location: string): Promise<void> {
    await this.state.writeReturnTo(location);
  }

  /**
   * @returns the stored location, cleared so it is used once
   */
  async consumeReturnTo(): Promise<string | null> {
    const location = await this.state.readReturnTo();
    this.state.clearReturnTo();
    return location;
  }

  private resolve(): Promise<ActiveSessionWithUser | null> {
    this.resolution ??= this.lookup();
    return this.resolution;
  }

  private async lookup(): Promise<ActiveSessionWithUser | null> {
    const sessionId = await this.state.readSessionId();
    if (sessionId) {
      return this.sessions.findWithUserById(sessionId);
    }

    const rememberToken = await this.state.readRememberToken();
    if (rememberToken) {
      return this.sessions.findWithUserByRememberToken(rememberToken);
    }

    return null;
  }

  private async requireResolved(): Promise<ActiveSessionWithUser> {
    const current = await this.resolve();
    if (!current) {
      throw new AuthenticationRequiredError();
    }
    return current;
  }
}
