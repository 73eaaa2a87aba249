import { type User, type UserRepository, type UserRole } from '@contactbook/domain';
import { pgClient } from '../client';

type UserRow = {
  id: string;
  email: string;
  password_hash: string;
  is_verified: boolean;
  role: UserRole;
  avatar_url: string | null;
  created_at: Date;
};

const USER_COLUMNS = 'id, email, password_hash, is_verified, role, avatar_url, created_at';

export class PgUserRepository implements UserRepository {
  async create(
    tx: unknown,
    user: { email: string; passwordHash: string; role: UserRole },
  ): Promise<User | null> {
    // Concurrent registrations race on the unique index; the loser gets no row.
    const result = await pgClient(tx).query<UserRow>(
      `INSERT INTO users (email, password_hash, role)
       VALUES ($1, $2, $3)
       ON CONFLICT (email) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.email, user.passwordHash, user.role],
    );
    return mapFirst(result.rows);
  }

  async findByEmail(tx: unknown, email: string): Promise<User | null> {
    const result = await pgClient(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email],
    );
    return mapFirst(result.rows);
  }

  async findById(tx: unknown, id: string): Promise<User | null> {
    const result = await pgClient(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return mapFirst(result.rows);
  }

  async list(tx: unknown): Promise<User[]> {
    const result = await pgClient(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY id`,
    );
    return result.rows.map(mapUserRow);
  }

  async markVerified(tx: unknown, id: string): Promise<void> {
    await pgClient(tx).query('UPDATE users SET is_verified = TRUE WHERE id = $1', [id]);
  }

  async updatePasswordHash(tx: unknown, id: string, passwordHash: string): Promise<void> {
    await pgClient(tx).query('UPDATE users SET password_hash = $2 WHERE id = $1', [id, passwordHash]);
  }

  async updateAvatar(tx: unknown, id: string, avatarUrl: string): Promise<User | null> {
    const result = await pgClient(tx).query<UserRow>(
      `UPDATE users SET avatar_url = $2
       WHERE id = $1 AND (avatar_url IS NULL OR role = 'ADMIN')
       RETURNING ${USER_COLUMNS}`,
      [id, avatarUrl],
    );
    return mapFirst(result.rows);
  }
}

function mapFirst(rows: UserRow[]): User | null {
  const row = rows[0];
  return row ? mapUserRow(row) : null;
}

function mapUserRow(row: UserRow): User {
  return {
    id: String(row.id),
    email: row.email,
    passwordHash: row.password_hash,
    isVerified: row.is_verified,
    role: row.role,
    avatarUrl: row.avatar_url,
    createdAt: row.created_at,
  };
}
