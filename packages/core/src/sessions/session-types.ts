import type { User } from '../users/user-types.js';

/**
 * One signed-in device. Sessions never expire on their own; they end when
 * revoked, signed out, or when their user is deleted.
 */
export interface ActiveSession {
  id: string;
  userId: string;
  rememberToken: string;
  userAgent: string | null;
  ipAddress: string | null;
  createdAt: Date;
}

export interface ActiveSessionWithUser {
  session: ActiveSession;
  user: User;
}

export interface CreateActiveSessionData {
  userId: string;
  rememberToken: string;
  userAgent: string | null;
  ipAddress: string | null;
}

export interface RequestMetadata {
  userAgent: string | null;
  ipAddress: string | null;
}

export interface ActiveSessionSummary {
  id: string;
  userAgent: string | null;
  ipAddress: string | null;
  createdAt: string;
  isCurrent: boolean;
}
