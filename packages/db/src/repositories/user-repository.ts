import { type PoolClient } from 'pg';
import { type User, type UserRepository } from '@tasknest/domain';

type UserRow = {
  id: number;
  email: string;
  password_hash: string;
  created_at: Date;
};

const USER_COLUMNS = 'id, email, password_hash, created_at';

export class PgUserRepository implements UserRepository<PoolClient> {
  async create(client: PoolClient, user: { email: string; passwordHash: string }): Promise<User | null> {
    const result = await client.query<UserRow>(
      `INSERT INTO users (email, password_hash)
       VALUES ($1, $2)
       ON CONFLICT (email) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.email, user.passwordHash],
    );
    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }

  async findByEmail(client: PoolClient, email: string): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email],
    );
    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  }
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}
