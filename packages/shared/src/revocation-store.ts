import { type RevocationRecord, type RevocationStore } from '@giftpair/domain';

export class InMemoryRevocationStore implements RevocationStore {
  private readonly records = new Map<string, RevocationRecord>();

  async contains(jti: string): Promise<boolean> {
    return this.records.has(jti);
  }

  async insert(record: RevocationRecord): Promise<void> {
    if (!this.records.has(record.jti)) {
      this.records.set(record.jti, record);
    }
  }

  async deleteExpired(before: Date): Promise<number> {
    let deleted = 0;
    for (const [jti, record] of this.records) {
      if (record.expiresAt.getTime() < before.getTime()) {
        this.records.delete(jti);
        deleted++;
      }
    }
    return deleted;
  }

  get size(): number {
    return this.records.size;
  }

  get(jti: string): RevocationRecord | undefined {
    return this.records.get(jti);
  }
}
