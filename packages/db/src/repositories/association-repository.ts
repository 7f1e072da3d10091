import { randomUUID } from 'node:crypto';
import { type PoolClient } from 'pg';
import { type Association, type AssociationRepository, type NewAssociation } from '@giftpair/domain';

interface AssociationRow {
  id: string;
  participant: string;
  gift: number;
  created_at: Date;
}

/** Key of the advisory lock that serializes pairing runs. */
const POOL_LOCK_KEY = 7_203_114;

export class PgAssociationRepository implements AssociationRepository {
  async lockPools(tx: unknown): Promise<void> {
    const client = tx as PoolClient;
    await client.query('SELECT pg_advisory_xact_lock($1)', [POOL_LOCK_KEY]);
  }

  async createMany(tx: unknown, associations: NewAssociation[]): Promise<Association[]> {
    const client = tx as PoolClient;
    const created: Association[] = [];
    for (const association of associations) {
      const result = await client.query<AssociationRow>(
        `INSERT INTO associations (id, participant, gift, kind)
         VALUES ($1, $2, $3, $4)
         RETURNING id, participant, gift, created_at`,
        [randomUUID(), association.participant, association.gift, association.kind],
      );
      created.push(mapAssociationRow(result.rows[0]));
    }
    return created;
  }

  async list(tx: unknown): Promise<Association[]> {
    const client = tx as PoolClient;
    const result = await client.query<AssociationRow>(
      `SELECT id, participant, gift, created_at
       FROM associations
       WHERE archived_at IS NULL
       ORDER BY created_at, participant`,
    );
    return result.rows.map(mapAssociationRow);
  }

  async archiveByParticipant(tx: unknown, participant: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      'UPDATE associations SET archived_at = NOW() WHERE participant = $1 AND archived_at IS NULL',
      [participant],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async archiveByGift(tx: unknown, gift: number): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      'UPDATE associations SET archived_at = NOW() WHERE gift = $1 AND archived_at IS NULL',
      [gift],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async archiveAll(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query('UPDATE associations SET archived_at = NOW() WHERE archived_at IS NULL');
    return result.rowCount ?? 0;
  }

  async count(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM associations WHERE archived_at IS NULL',
    );
    return result.rows[0]?.count ?? 0;
  }

  async deleteAll(tx: unknown): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query('DELETE FROM associations');
    return result.rowCount ?? 0;
  }
}

function mapAssociationRow(row: AssociationRow): Association {
  return {
    id: row.id,
    participant: row.participant,
    gift: row.gift,
    kind: 'participant-gift',
    createdAt: row.created_at,
  };
}
