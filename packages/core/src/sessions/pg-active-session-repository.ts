import { randomUUID } from 'node:crypto';
import type pg from 'pg';
import { isUuid } from '@latchkey/database';
import { mapUserRow, type UserRow } from '../users/pg-user-repository.js';
import type { ActiveSessionRepository } from './session-repository.js';
import type { ActiveSession, ActiveSessionWithUser, CreateActiveSessionData } from './session-types.js';

interface ActiveSessionRow {
  id: string;
  user_id: string;
  remember_token: string;
  user_agent: string | null;
  ip_address: string | null;
  created_at: Date;
}

interface ActiveSessionWithUserRow extends ActiveSessionRow {
  u_id: string;
  u_email: string;
  u_unconfirmed_email: string | null;
  u_password_hash: string;
  u_confirmed_at: Date | null;
  u_created_at: Date;
  u_updated_at: Date;
}

const SESSION_COLUMNS = 'id, user_id, remember_token, user_agent, ip_address, created_at';

const SESSION_WITH_USER_SELECT = `
  SELECT s.id, s.user_id, s.remember_token, s.user_agent, s.ip_address, s.created_at,
         u.id AS u_id, u.email AS u_email, u.unconfirmed_email AS u_unconfirmed_email,
         u.password_hash AS u_password_hash, u.confirmed_at AS u_confirmed_at,
         u.created_at AS u_created_at, u.updated_at AS u_updated_at
  FROM active_sessions s
  JOIN users u ON u.id = s.user_id`;

function mapSessionRow(row: ActiveSessionRow): ActiveSession {
  return {
    id: row.id,
    userId: row.user_id,
    rememberToken: row.remember_token,
    userAgent: row.user_agent,
    ipAddress: row.ip_address,
    createdAt: row.created_at,
  };
}

function mapSessionWithUserRow(row: ActiveSessionWithUserRow): ActiveSessionWithUser {
  const user: UserRow = {
    id: row.u_id,
    email: row.u_email,
    unconfirmed_email: row.u_unconfirmed_email,
    password_hash: row.u_password_hash,
    confirmed_at: row.u_confirmed_at,
    created_at: row.u_created_at,
    updated_at: row.u_updated_at,
  };
  return { session: mapSessionRow(row), user: mapUserRow(user) };
}

export class PgActiveSessionRepository implements ActiveSessionRepository {
  constructor(private readonly pool: pg.Pool) {}

  async create(data: CreateActiveSessionData): Promise<ActiveSession> {
    const { rows } = await this.pool.query<ActiveSessionRow>(
      `INSERT INTO active_sessions (id, user_id, remember_token, user_agent, ip_address)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${SESSION_COLUMNS}`,
      [randomUUID(), data.userId, data.rememberToken, data.userAgent, data.ipAddress]
    );
    const row = rows[0];
    if (!row) {
      throw new Error('Active session insert returned no row');
    }
    return mapSessionRow(row);
  }

  async findWithUserById(sessionId: string): Promise<ActiveSessionWithUser | null> {
    if (!isUuid(sessionId)) {
      return null;
    }
    const { rows } = await this.pool.query<ActiveSessionWithUserRow>(
      `${SESSION_WITH_USER_SELECT} WHERE s.id = $1`,
      [sessionId]
    );
    return rows[0] ? mapSessionWithUserRow(rows[0]) : null;
  }

  async findWithUserByRememberToken(rememberToken: string): Promise<ActiveSessionWithUser | null> {
    if (!rememberToken) {
      return null;
    }
    const { rows } = await this.pool.query<ActiveSessionWithUserRow>(
      `${SESSION_WITH_USER_SELECT} WHERE s.remember_token = $1`,
      [rememberToken]
    );
    return rows[0] ? mapSessionWithUserRow(rows[0]) : null;
  }

  async findByIdForUser(sessionId: string, userId: string): Promise<ActiveSession | null> {
    if (!isUuid(sessionId) || !isUuid(userId)) {
      return null;
    }
    const { rows } = await this.pool.query<ActiveSessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM active_sessions WHERE id = $1 AND user_id = $2`,
      [sessionId, userId]
    );
    return rows[0] ? mapSessionRow(rows[0]) : null;
  }

  async listForUser(userId: string): Promise<ActiveSession[]> {
    if (!isUuid(userId)) {
      return [];
    }
    const { rows } = await this.pool.query<ActiveSessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM active_sessions
       WHERE user_id = $1
       ORDER BY created_at DESC, id DESC`,
      [userId]
    );
    return rows.map(mapSessionRow);
  }

  async delete(sessionId: string): Promise<boolean> {
    if (!isUuid(sessionId)) {
      return false;
    }
    const result = await this.pool.query('DELETE FROM active_sessions WHERE id = $1', [sessionId]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteAllForUser(userId: string): Promise<number> {
    if (!isUuid(userId)) {
      return 0;
    }
    const result = await this.pool.query('DELETE FROM active_sessions WHERE user_id = $1', [userId]);
    return result.rowCount ?? 0;
  }
}
