import { type PoolClient } from 'pg';
import { type Admin, type AdminRepository } from '@giftpair/domain';

interface AdminRow {
  id: string;
  username: string;
  password_hash: string;
  created_at: Date;
}

const ADMIN_COLUMNS = 'id, username, password_hash, created_at';

export class PgAdminRepository implements AdminRepository {
  async create(tx: unknown, admin: { id: string; username: string; passwordHash: string }): Promise<Admin> {
    const client = tx as PoolClient;
    const result = await client.query<AdminRow>(
      `INSERT INTO admins (id, username, password_hash)
       VALUES ($1, $2, $3)
       RETURNING ${ADMIN_COLUMNS}`,
      [admin.id, admin.username, admin.passwordHash],
    );
    return mapAdminRow(result.rows[0]);
  }

  async findByUsername(tx: unknown, username: string): Promise<Admin | null> {
    const client = tx as PoolClient;
    const result = await client.query<AdminRow>(`SELECT ${ADMIN_COLUMNS} FROM admins WHERE username = $1`, [
      username,
    ]);
    return result.rows[0] ? mapAdminRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<Admin | null> {
    const client = tx as PoolClient;
    const result = await client.query<AdminRow>(`SELECT ${ADMIN_COLUMNS} FROM admins WHERE id = $1`, [id]);
    return result.rows[0] ? mapAdminRow(result.rows[0]) : null;
  }

  async list(tx: unknown): Promise<Admin[]> {
    const client = tx as PoolClient;
    const result = await client.query<AdminRow>(`SELECT ${ADMIN_COLUMNS} FROM admins ORDER BY created_at, username`);
    return result.rows.map(mapAdminRow);
  }

  async updatePassword(tx: unknown, id: string, passwordHash: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query('UPDATE admins SET password_hash = $2 WHERE id = $1', [id, passwordHash]);
  }

  async delete(tx: unknown, id: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query('DELETE FROM admins WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

function mapAdminRow(row: AdminRow): Admin {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}
