import { type Pool } from 'pg';
import { type RevocationRecord, type RevocationStore } from '@giftpair/domain';

/**
 * Blocklist backed by `revoked_tokens`. Runs on the pool rather than a caller
 * transaction: a revocation must be visible to every later request.
 */
export class PgRevocationStore implements RevocationStore {
  constructor(private readonly pool: Pick<Pool, 'query'>) {}

  async contains(jti: string): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 FROM revoked_tokens WHERE jti = $1', [jti]);
    return (result.rowCount ?? 0) > 0;
  }

  async insert(record: RevocationRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO revoked_tokens (jti, kind, subject_id, revoked_at, expires_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (jti) DO NOTHING`,
      [record.jti, record.kind, record.subjectId, record.revokedAt, record.expiresAt],
    );
  }

  async deleteExpired(before: Date): Promise<number> {
    const result = await this.pool.query('DELETE FROM revoked_tokens WHERE expires_at < $1', [before]);
    return result.rowCount ?? 0;
  }
}
