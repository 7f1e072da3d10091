import { type PoolClient } from 'pg';
import { type Participant, type ParticipantRepository } from '@giftpair/domain';

interface ParticipantRow {
  name: string;
  gift: number | null;
  created_at: Date;
}

export class PgParticipantRepository implements ParticipantRepository {
  async add(tx: unknown, name: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO participants (name) VALUES ($1)
       ON CONFLICT (name) WHERE archived_at IS NULL DO NOTHING`,
      [name],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async archive(tx: unknown, name: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      'UPDATE participants SET archived_at = NOW() WHERE name = $1 AND archived_at IS NULL',
      [name],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async exists(tx: unknown, name: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query('SELECT 1 FROM participants WHERE name = $1 AND archived_at IS NULL', [name]);
    return (result.rowCount ?? 0) > 0;
  }

  async list(tx: unknown): Promise<Participant[]> {
    const client = tx as PoolClient;
    const result = await client.query<ParticipantRow>(
      `SELECT p.name, a.gift, p.created_at
       FROM participants p
       LEFT JOIN associations a ON a.participant = p.name AND a.archived_at IS NULL
       WHERE p.archived_at IS NULL
       ORDER BY p.created_at, p.id`,
    );
    return result.rows.map((row) => ({ name: row.name, gift: row.gift, createdAt: row.created_at }));
  }

  async listUnassociated(tx: unknown): Promise<string[]> {
    const client = tx as PoolClient;
    const result = await client.query<{ name: string }>(
      `SELECT p.name
       FROM participants p
       WHERE p.archived_at IS NULL
         AND NOT EXISTS (
           SELECT 1 FROM associations a WHERE a.participant = p.name AND a.archived_at IS NULL
         )
       ORDER BY p.created_at, p.id`,
    );
    return result.rows.map((row) => row.name);
  }

  async count(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM participants WHERE archived_at IS NULL',
    );
    return result.rows[0]?.count ?? 0;
  }

  async deleteAll(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query('DELETE FROM participants');
    return result.rowCount ?? 0;
  }
}
