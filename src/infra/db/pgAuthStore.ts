import type { Pool } from 'pg';
import { RegistrationConflictError } from '../../domain/auth/errors.js';
import { isRole, type NewUser, type User } from '../../domain/auth/user.js';
import {
  TOP_USERS_LIMIT,
  type AuthStore,
  type DailyUsage,
  type RevokedToken,
  type TopUser,
  type UsageRecord,
  type UsageSummary,
} from '../../application/auth/ports.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  role: string;
  is_active: boolean;
  api_key: string | null;
  company: string | null;
  full_name: string | null;
  created_at: Date;
  last_login: Date | null;
}

const USER_COLUMNS = `id, username, email, password_hash, role, is_active, api_key,
  company, full_name, created_at, last_login`;

const UNIQUE_VIOLATION = '23505';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function toUser(row: UserRow): User {
  if (!isRole(row.role)) {
    throw new Error(`Unknown role "${row.role}" for user ${row.id}`);
  }
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    isActive: row.is_active,
    apiKey: row.api_key,
    company: row.company,
    fullName: row.full_name,
    createdAt: row.created_at,
    lastLogin: row.last_login,
  };
}

function uniqueViolationConstraint(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if (!('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return null;
  }
  return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : '';
}

/**
 * PostgreSQL-backed store. Uniqueness is enforced by unique indexes, so
 * concurrent registrations race inside the database, not in this process.
 */
export class PgAuthStore implements AuthStore {
  constructor(private pool: Pool) {}

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async findById(id: string): Promise<User | null> {
    // Ids come from URLs and token claims; a non-UUID would be a cast error in SQL
    if (!UUID_PATTERN.test(id)) {
      return null;
    }
    return this.findOne('id = $1', [id]);
  }

  async findByIdentifier(identifier: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE LOWER(username) = LOWER($1) OR LOWER(email) = LOWER($1)
       ORDER BY (LOWER(username) = LOWER($1)) DESC
       LIMIT 1`,
      [identifier]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('LOWER(username) = LOWER($1)', [username]);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('LOWER(email) = LOWER($1)', [email]);
  }

  async findByApiKey(apiKey: string): Promise<User | null> {
    return this.findOne('api_key = $1', [apiKey]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (username, email, password_hash, role, api_key, company, full_name)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${USER_COLUMNS}`,
        [
          user.username,
          user.email,
          user.passwordHash,
          user.role,
          user.apiKey,
          user.company ?? null,
          user.fullName ?? null,
        ]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint?.includes('username')) {
        throw new RegistrationConflictError('username');
      }
      if (constraint?.includes('email')) {
        throw new RegistrationConflictError('email');
      }
      throw error;
    }
  }

  async updateLastLogin(id: string, at: Date): Promise<void> {
    await this.pool.query('UPDATE users SET last_login = $2 WHERE id = $1', [id, at]);
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<void> {
    await this.pool.query('UPDATE users SET password_hash = $2 WHERE id = $1', [
      id,
      passwordHash,
    ]);
  }

  async updateApiKey(id: string, apiKey: string): Promise<void> {
    await this.pool.query('UPDATE users SET api_key = $2 WHERE id = $1', [id, apiKey]);
  }

  async setActive(id: string, active: boolean): Promise<void> {
    await this.pool.query('UPDATE users SET is_active = $2 WHERE id = $1', [id, active]);
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM users'
    );
    return result.rows[0].count;
  }

  async countActive(): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM users WHERE is_active'
    );
    return result.rows[0].count;
  }

  async list(): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at DESC, id DESC`
    );
    return result.rows.map(toUser);
  }

  async revoke(entry: RevokedToken): Promise<void> {
    await this.pool.query(
      `INSERT INTO revoked_tokens (token_id, user_id, expires_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (token_id) DO NOTHING`,
      [entry.tokenId, entry.userId, entry.expiresAt]
    );
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 FROM revoked_tokens WHERE token_id = $1', [
      tokenId,
    ]);
    return result.rows.length > 0;
  }

  async pruneExpired(now: Date): Promise<number> {
    const result = await this.pool.query('DELETE FROM revoked_tokens WHERE expires_at <= $1', [
      now,
    ]);
    return result.rowCount ?? 0;
  }

  async appendUsage(record: UsageRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO api_usage (user_id, endpoint, status_code, duration_ms, occurred_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [record.userId, record.endpoint, record.statusCode, record.durationMs, record.timestamp]
    );
  }

  async countUsageSince(userId: string, since: Date): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM api_usage
       WHERE user_id = $1 AND occurred_at >= $2`,
      [userId, since]
    );
    return result.rows[0].count;
  }

  async usageStats(since: Date): Promise<UsageSummary> {
    const daily = await this.pool.query<DailyUsage>(
      `SELECT to_char(occurred_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS date,
              COUNT(*)::int AS calls,
              COUNT(DISTINCT user_id)::int AS users
       FROM api_usage
       WHERE occurred_at >= $1
       GROUP BY 1
       ORDER BY 1 DESC`,
      [since]
    );

    const topUsers = await this.pool.query<TopUser>(
      `SELECT u.username, COUNT(a.id)::int AS calls
       FROM api_usage a
       JOIN users u ON u.id = a.user_id
       WHERE a.occurred_at >= $1
       GROUP BY u.id, u.username
       ORDER BY calls DESC, u.username ASC
       LIMIT $2`,
      [since, TOP_USERS_LIMIT]
    );

    return { daily: daily.rows, topUsers: topUsers.rows };
  }

  private async findOne(where: string, params: unknown[]): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${where}`,
      params
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }
}
