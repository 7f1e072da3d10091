import { describe, it, expect, vi } from 'vitest';
import { PgAssociationRepository } from '../repositories/association-repository';
import { PgParticipantRepository } from '../repositories/participant-repository';
import { PgGiftRepository } from '../repositories/gift-repository';
import { PgRevocationStore } from '../repositories/revocation-store';

function fakeClient(...results: { rows?: unknown[]; rowCount?: number | null }[]) {
  const query = vi.fn();
  for (const result of results) {
    query.mockResolvedValueOnce({ rows: result.rows ?? [], rowCount: result.rowCount ?? 0 });
  }
  return { query };
}

describe('PgParticipantRepository', () => {
  const repo = new PgParticipantRepository();

  it('reports an insert skipped by the active-name index as not added', async () => {
    const client = fakeClient({ rowCount: 1 }, { rowCount: 0 });

    expect(await repo.add(client, 'Alice')).toBe(true);
    expect(await repo.add(client, 'Alice')).toBe(false);
    expect(client.query.mock.calls[0][0]).toContain('ON CONFLICT (name) WHERE archived_at IS NULL DO NOTHING');
    expect(client.query.mock.calls[0][1]).toEqual(['Alice']);
  });

  it('maps listed rows', async () => {
    const createdAt = new Date('2026-01-01T00:00:00Z');
    const client = fakeClient({
      rows: [
        { name: 'Alice', gift: 10, created_at: createdAt },
        { name: 'Bob', gift: null, created_at: createdAt },
      ],
    });

    expect(await repo.list(client)).toEqual([
      { name: 'Alice', gift: 10, createdAt },
      { name: 'Bob', gift: null, createdAt },
    ]);
  });

  it('returns unassociated names in order', async () => {
    const client = fakeClient({ rows: [{ name: 'Carl' }, { name: 'Dana' }] });
    expect(await repo.listUnassociated(client)).toEqual(['Carl', 'Dana']);
  });

  it('counts zero when no row comes back', async () => {
    const client = fakeClient({ rows: [] });
    expect(await repo.count(client)).toBe(0);
  });
});

describe('PgGiftRepository', () => {
  const repo = new PgGiftRepository();

  it('archives only an active gift', async () => {
    const client = fakeClient({ rowCount: 1 }, { rowCount: 0 });

    expect(await repo.archive(client, 10)).toBe(true);
    expect(await repo.archive(client, 10)).toBe(false);
    expect(client.query.mock.calls[0][1]).toEqual([10]);
  });

  it('maps listed rows', async () => {
    const createdAt = new Date('2026-01-01T00:00:00Z');
    const client = fakeClient({ rows: [{ number: 10, associated: true, created_at: createdAt }] });

    expect(await repo.list(client)).toEqual([{ number: 10, associated: true, createdAt }]);
  });
});

describe('PgAssociationRepository', () => {
  const repo = new PgAssociationRepository();

  it('takes a transaction-scoped advisory lock', async () => {
    const client = fakeClient({});
    await repo.lockPools(client);

    expect(client.query.mock.calls[0][0]).toBe('SELECT pg_advisory_xact_lock($1)');
  });

  it('inserts one row per new association', async () => {
    const createdAt = new Date('2026-01-01T00:00:00Z');
    const client = fakeClient(
      { rows: [{ id: 'a-1', participant: 'Alice', gift: 10, created_at: createdAt }] },
      { rows: [{ id: 'a-2', participant: 'Bob', gift: 20, created_at: createdAt }] },
    );

    const created = await repo.createMany(client, [
      { participant: 'Alice', gift: 10, kind: 'participant-gift' },
      { participant: 'Bob', gift: 20, kind: 'participant-gift' },
    ]);

    expect(created).toEqual([
      { id: 'a-1', participant: 'Alice', gift: 10, kind: 'participant-gift', createdAt },
      { id: 'a-2', participant: 'Bob', gift: 20, kind: 'participant-gift', createdAt },
    ]);
    expect(client.query).toHaveBeenCalledTimes(2);
    expect(client.query.mock.calls[1][1]).toEqual([expect.any(String), 'Bob', 20, 'participant-gift']);
  });

  it('returns the number of archived associations', async () => {
    const client = fakeClient({ rowCount: 3 });
    expect(await repo.archiveAll(client)).toBe(3);
  });
});

describe('PgRevocationStore', () => {
  it('ignores a second insert of the same jti', async () => {
    const pool = fakeClient({ rowCount: 1 });
    const store = new PgRevocationStore(pool);
    const revokedAt = new Date('2026-01-01T00:00:00Z');
    const expiresAt = new Date('2026-01-01T01:00:00Z');

    await store.insert({ jti: 'jti-1', kind: 'access', subjectId: 'admin-1', revokedAt, expiresAt });

    expect(pool.query.mock.calls[0][0]).toContain('ON CONFLICT (jti) DO NOTHING');
    expect(pool.query.mock.calls[0][1]).toEqual(['jti-1', 'access', 'admin-1', revokedAt, expiresAt]);
  });

  it('checks membership by jti', async () => {
    const pool = fakeClient({ rowCount: 1 }, { rowCount: 0 });
    const store = new PgRevocationStore(pool);

    expect(await store.contains('jti-1')).toBe(true);
    expect(await store.contains('jti-2')).toBe(false);
  });

  it('deletes records that expired before the cutoff', async () => {
    const pool = fakeClient({ rowCount: 2 });
    const store = new PgRevocationStore(pool);
    const cutoff = new Date('2026-01-02T00:00:00Z');

    expect(await store.deleteExpired(cutoff)).toBe(2);
    expect(pool.query.mock.calls[0][1]).toEqual([cutoff]);
  });
});
