/**
 * PostgreSQL implementation of the credential store.
 */

import { randomUUID } from 'node:crypto';
import type pg from 'pg';
import { isUniqueViolation, isUuid } from '@latchkey/database';
import { DuplicateEmailError } from './user-errors.js';
import type { UserRepository } from './user-repository.js';
import type { ConfirmUserParams, ConfirmUserResult, CreateUserData, User } from './user-types.js';
import { normalizeEmail } from './user-validation.js';

export interface UserRow {
  id: string;
  email: string;
  unconfirmed_email: string | null;
  password_hash: string;
  confirmed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export const USER_COLUMNS =
  'id, email, unconfirmed_email, password_hash, confirmed_at, created_at, updated_at';

const EMAIL_UNIQUE_INDEX = 'users_email_key';

export function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    unconfirmedEmail: row.unconfirmed_email,
    passwordHash: row.password_hash,
    confirmedAt: row.confirmed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly pool: pg.Pool) {}

  async findById(userId: string): Promise<User | null> {
    // Fast-return for obviously invalid IDs to avoid uuid cast errors
    if (!isUuid(userId)) {
      return null;
    }
    const { rows } = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [
      userId,
    ]);
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const { rows } = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [normalizeEmail(email)]
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async create(data: CreateUserData): Promise<User> {
    try {
      const { rows } = await this.pool.query<UserRow>(
        `INSERT INTO users (id, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [randomUUID(), data.email, data.passwordHash]
      );
      const row = rows[0];
      if (!row) {
        throw new Error('User insert returned no row');
      }
      return mapUserRow(row);
    } catch (error) {
      if (isUniqueViolation(error, EMAIL_UNIQUE_INDEX)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<User | null> {
    if (!isUuid(userId)) {
      return null;
    }
    const { rows } = await this.pool.query<UserRow>(
      `UPDATE users SET password_hash = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [userId, passwordHash]
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async setUnconfirmedEmail(userId: string, unconfirmedEmail: string | null): Promise<User | null> {
    if (!isUuid(userId)) {
      return null;
    }
    const { rows } = await this.pool.query<UserRow>(
      `UPDATE users SET unconfirmed_email = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [userId, unconfirmedEmail]
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async confirm(userId: string, params: ConfirmUserParams): Promise<ConfirmUserResult> {
    if (!isUuid(userId)) {
      return { status: 'stale' };
    }

    try {
      // The unique index on email re-checks availability inside this write.
      const { rows } = await this.pool.query<UserRow>(
        `UPDATE users
         SET email = COALESCE(unconfirmed_email, email),
             unconfirmed_email = NULL,
             confirmed_at = $2,
             updated_at = NOW()
         WHERE id = $1
           AND unconfirmed_email IS NOT DISTINCT FROM $3
           AND (confirmed_at IS NULL OR unconfirmed_email IS NOT NULL)
         RETURNING ${USER_COLUMNS}`,
        [userId, params.confirmedAt, params.expectedUnconfirmedEmail]
      );
      const row = rows[0];
      return row ? { status: 'confirmed', user: mapUserRow(row) } : { status: 'stale' };
    } catch (error) {
      if (isUniqueViolation(error, EMAIL_UNIQUE_INDEX)) {
        return { status: 'email_taken' };
      }
      throw error;
    }
  }

  async delete(userId: string): Promise<boolean> {
    if (!isUuid(userId)) {
      return false;
    }
    const result = await this.pool.query('DELETE FROM users WHERE id = $1', [userId]);
    return (result.rowCount ?? 0) > 0;
  }
}
