import type { ActiveSession, ActiveSessionWithUser, CreateActiveSessionData } from './session-types.js';

/**
 * Data access contract for the session store.
 *
 * Lookups return null for rows that are gone: another device may revoke a
 * session while a request that uses it is in flight.
 */
export interface ActiveSessionRepository {
  create(data: CreateActiveSessionData): Promise<ActiveSession>;

  findWithUserById(sessionId: string): Promise<ActiveSessionWithUser | null>;

  findWithUserByRememberToken(rememberToken: string): Promise<ActiveSessionWithUser | null>;

  findByIdForUser(sessionId: string, userId: string): Promise<ActiveSession | null>;

  /** Newest first. */
  listForUser(userId: string): Promise<ActiveSession[]>;

  delete(sessionId: string): Promise<boolean>;

  /** @returns how many sessions were deleted */
  deleteAllForUser(userId: string): Promise<number>;
}
