/**
 * In-process stand-ins for the pg repositories. They share one store so the
 * session/user join and the cascade on user deletion behave like PostgreSQL.
 */

import { randomUUID } from 'node:crypto';
import { DuplicateEmailError } from '../users/user-errors.js';
import type { UserRepository } from '../users/user-repository.js';
import type { ConfirmUserParams, ConfirmUserResult, CreateUserData, User } from '../users/user-types.js';
import { normalizeEmail } from '../users/user-validation.js';
import type { ActiveSessionRepository } from '../sessions/session-repository.js';
import type {
  ActiveSession,
  ActiveSessionWithUser,
  CreateActiveSessionData,
} from '../sessions/session-types.js';

export interface InMemoryStoreOptions {
  now?: () => Date;
}

export class InMemoryStore {
  readonly users = new Map<string, User>();
  readonly sessions = new Map<string, ActiveSession>();
  readonly now: () => Date;

  constructor(options: InMemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }
}

export class InMemoryUserRepository implements UserRepository {
  constructor(private readonly store: InMemoryStore) {}

  async findById(userId: string): Promise<User | null> {
    return this.copy(this.store.users.get(userId));
  }

  async findByEmail(email: string): Promise<User | null> {
    const normalized = normalizeEmail(email);
    return this.copy([...this.store.users.values()].find((user) => user.email === normalized));
  }

  async create(data: CreateUserData): Promise<User> {
    if (this.emailTaken(data.email)) {
      throw new DuplicateEmailError();
    }
    const now = this.store.now();
    const user: User = {
      id: randomUUID(),
      email: data.email,
      unconfirmedEmail: null,
      passwordHash: data.passwordHash,
      confirmedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.store.users.set(user.id, user);
    return { ...user };
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<User | null> {
    return this.update(userId, { passwordHash });
  }

  async setUnconfirmedEmail(userId: string, unconfirmedEmail: string | null): Promise<User | null> {
    return this.update(userId, { unconfirmedEmail });
  }

  async confirm(userId: string, params: ConfirmUserParams): Promise<ConfirmUserResult> {
    const user = this.store.users.get(userId);
    if (
      !user ||
      user.unconfirmedEmail !== params.expectedUnconfirmedEmail ||
      (user.confirmedAt !== null && user.unconfirmedEmail === null)
    ) {
      return { status: 'stale' };
    }

    const email = user.unconfirmedEmail ?? user.email;
    if (email !== user.email && this.emailTaken(email)) {
      return { status: 'email_taken' };
    }

    const confirmed: User = {
      ...user,
      email,
      unconfirmedEmail: null,
      confirmedAt: params.confirmedAt,
      updatedAt: this.store.now(),
    };
    this.store.users.set(userId, confirmed);
    return { status: 'confirmed', user: { ...confirmed } };
  }

  async delete(userId: string): Promise<boolean> {
    if (!this.store.users.delete(userId)) {
      return false;
    }
    for (const [sessionId, session] of this.store.sessions) {
      if (session.userId === userId) {
        this.store.sessions.delete(sessionId);
      }
    }
    return true;
  }

  private emailTaken(email: string): boolean {
    return [...this.store.users.values()].some((user) => user.email === email);
  }

  private update(userId: string, changes: Partial<Pick<User, 'passwordHash' | 'unconfirmedEmail'>>) {
    const user = this.store.users.get(userId);
    if (!user) {
      return null;
    }
    const updated: User = { ...user, ...changes, updatedAt: this.store.now() };
    this.store.users.set(userId, updated);
    return { ...updated };
  }

  private copy(user: User | undefined): User | null {
    return user ? { ...user } : null;
  }
}

export class InMemoryActiveSessionRepository implements ActiveSessionRepository {
  private sequence = 0;
  private readonly order = new Map<string, number>();

  constructor(private readonly store: InMemoryStore) {}

  async create(data: CreateActiveSessionData): Promise<ActiveSession> {
    if (!this.store.users.has(data.userId)) {
      throw new Error(`Foreign key violation: user ${data.userId} does not exist`);
    }
    if ([...this.store.sessions.values()].some((s) => s.rememberToken === data.rememberToken)) {
      throw new Error('Unique violation: remember_token');
    }
    const session: ActiveSession = {
      id: randomUUID(),
      userId: data.userId,
      rememberToken: data.rememberToken,
      userAgent: data.userAgent,
      ipAddress: data.ipAddress,
      createdAt: this.store.now(),
    };
    this.store.sessions.set(session.id, session);
    this.order.set(session.id, this.sequence++);
    return { ...session };
  }

  async findWithUserById(sessionId: string): Promise<ActiveSessionWithUser | null> {
    return this.withUser(this.store.sessions.get(sessionId));
  }

  async findWithUserByRememberToken(rememberToken: string): Promise<ActiveSessionWithUser | null> {
    return this.withUser(
      [...this.store.sessions.values()].find((session) => session.rememberToken === rememberToken)
    );
  }

  async findByIdForUser(sessionId: string, userId: string): Promise<ActiveSession | null> {
    const session = this.store.sessions.get(sessionId);
    return session && session.userId === userId ? { ...session } : null;
  }

  async listForUser(userId: string): Promise<ActiveSession[]> {
    return [...this.store.sessions.values()]
      .filter((session) => session.userId === userId)
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          (this.order.get(b.id) ?? 0) - (this.order.get(a.id) ?? 0)
      )
      .map((session) => ({ ...session }));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.store.sessions.delete(sessionId);
  }

  async deleteAllForUser(userId: string): Promise<number> {
    let deleted = 0;
    for (const [sessionId, session] of this.store.sessions) {
      if (session.userId === userId) {
        this.store.sessions.delete(sessionId);
        deleted += 1;
      }
    }
    return deleted;
  }

  private withUser(session: ActiveSession | undefined): ActiveSessionWithUser | null {
    if (!session) {
      return null;
    }
    const user = this.store.users.get(session.userId);
    return user ? { session: { ...session }, user: { ...user } } : null;
  }
}
