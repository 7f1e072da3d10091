import { type BulkAddResult, type Gift, type Participant, type RosterCounts } from './roster';
import {
  type AssociationRepository,
  type GiftRepository,
  type ParticipantRepository,
  type WithTransaction,
} from './ports';

export interface RosterServiceDeps {
  participantRepo: ParticipantRepository;
  giftRepo: GiftRepository;
  associationRepo: AssociationRepository;
  withTransaction: WithTransaction;
}

export interface PoolStatus {
  total: number;
  associated: number;
  unassociated: number;
}

export interface RosterStatus {
  participants: PoolStatus;
  gifts: PoolStatus;
  associations: number;
}

export class RosterService {
  constructor(private readonly deps: RosterServiceDeps) {}

  async addParticipant(name: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const added = await this.deps.participantRepo.add(tx, name);
      if (!added) {
        throw new RosterError('CONFLICT', `Participant '${name}' already exists`);
      }
    });
  }

  async addParticipants(names: string[]): Promise<BulkAddResult<string>> {
    return this.deps.withTransaction(async (tx) => {
      const result: BulkAddResult<string> = { added: [], ignored: [] };
      for (const name of names) {
        const added = await this.deps.participantRepo.add(tx, name);
        (added ? result.added : result.ignored).push(name);
      }
      return result;
    });
  }

  /** Archives the participant; its association, if any, is archived with it. */
  async removeParticipant(name: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const archived = await this.deps.participantRepo.archive(tx, name);
      if (!archived) {
        throw new RosterError('NOT_FOUND', `Participant '${name}' does not exist`);
      }
      await this.deps.associationRepo.archiveByParticipant(tx, name);
    });
  }

  async listParticipants(): Promise<Participant[]> {
    return this.deps.withTransaction((tx) => this.deps.participantRepo.list(tx));
  }

  async addGift(gift: number): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const added = await this.deps.giftRepo.add(tx, gift);
      if (!added) {
        throw new RosterError('CONFLICT', `Gift ${gift} already exists`);
      }
    });
  }

  async addGifts(gifts: number[]): Promise<BulkAddResult<number>> {
    return this.deps.withTransaction(async (tx) => {
      const result: BulkAddResult<number> = { added: [], ignored: [] };
      for (const gift of gifts) {
        const added = await this.deps.giftRepo.add(tx, gift);
        (added ? result.added : result.ignored).push(gift);
      }
      return result;
    });
  }

  async removeGift(gift: number): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const archived = await this.deps.giftRepo.archive(tx, gift);
      if (!archived) {
        throw new RosterError('NOT_FOUND', `Gift ${gift} does not exist`);
      }
      await this.deps.associationRepo.archiveByGift(tx, gift);
    });
  }

  async listGifts(): Promise<Gift[]> {
    return this.deps.withTransaction((tx) => this.deps.giftRepo.list(tx));
  }

  async getStatus(): Promise<RosterStatus> {
    const { participantRepo, giftRepo, associationRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const [participantTotal, freeParticipants, giftTotal, freeGifts, associations] = await Promise.all([
        participantRepo.count(tx),
        participantRepo.listUnassociated(tx),
        giftRepo.count(tx),
        giftRepo.listUnassociated(tx),
        associationRepo.count(tx),
      ]);

      return {
        participants: poolStatus(participantTotal, freeParticipants.length),
        gifts: poolStatus(giftTotal, freeGifts.length),
        associations,
      };
    });
  }

  /** Deletes everything and returns what was there before. */
  async reset(): Promise<RosterCounts> {
    const { participantRepo, giftRepo, associationRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const associations = await associationRepo.deleteAll(tx);
      const participants = await participantRepo.deleteAll(tx);
      const gifts = await giftRepo.deleteAll(tx);
      return { participants, gifts, associations };
    });
  }
}

function poolStatus(total: number, unassociated: number): PoolStatus {
  return { total, associated: total - unassociated, unassociated };
}

export class RosterError extends Error {
  constructor(
    public readonly kind: 'CONFLICT' | 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'RosterError';
  }
}
