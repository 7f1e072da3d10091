import { type PoolClient } from 'pg';
import { type Gift, type GiftRepository } from '@giftpair/domain';

interface GiftRow {
  number: number;
  associated: boolean;
  created_at: Date;
}

export class PgGiftRepository implements GiftRepository {
  async add(tx: unknown, gift: number): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO gifts (number) VALUES ($1)
       ON CONFLICT (number) WHERE archived_at IS NULL DO NOTHING`,
      [gift],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async archive(tx: unknown, gift: number): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      'UPDATE gifts SET archived_at = NOW() WHERE number = $1 AND archived_at IS NULL',
      [gift],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async list(tx: unknown): Promise<Gift[]> {
    const client = tx as PoolClient;
    const result = await client.query<GiftRow>(
      `SELECT g.number,
              EXISTS (
                SELECT 1 FROM associations a WHERE a.gift = g.number AND a.archived_at IS NULL
              ) AS associated,
              g.created_at
       FROM gifts g
       WHERE g.archived_at IS NULL
       ORDER BY g.number`,
    );
    return result.rows.map((row) => ({ number: row.number, associated: row.associated, createdAt: row.created_at }));
  }

  async listUnassociated(tx: unknown): Promise<number[]> {
    const client = tx as PoolClient;
    const result = await client.query<{ number: number }>(
      `SELECT g.number
       FROM gifts g
       WHERE g.archived_at IS NULL
         AND NOT EXISTS (
           SELECT 1 FROM associations a WHERE a.gift = g.number AND a.archived_at IS NULL
         )
       ORDER BY g.number`,
    );
    return result.rows.map((row) => row.number);
  }

  async count(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM gifts WHERE archived_at IS NULL',
    );
    return result.rows[0]?.count ?? 0;
  }

  async deleteAll(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query('DELETE FROM gifts');
    return result.rowCount ?? 0;
  }
}
