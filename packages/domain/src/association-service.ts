import { type Association } from './roster';
import {
  type AssociationDraw,
  type CoupleDraw,
  type NothingToPair,
  type Random,
  pairCrossThenSameKind,
  pairParticipantsWithGifts,
} from './pairing';
import {
  type AssociationRepository,
  type GiftRepository,
  type ParticipantRepository,
  type WithTransaction,
} from './ports';
import { RosterError } from './roster-service';

export interface AssociationServiceDeps {
  participantRepo: ParticipantRepository;
  giftRepo: GiftRepository;
  associationRepo: AssociationRepository;
  random: Random;
  withTransaction: WithTransaction;
}

export type AssociateResult =
  | NothingToPair
  | (Omit<AssociationDraw, 'associations'> & { associations: Association[] });

export class AssociationService {
  constructor(private readonly deps: AssociationServiceDeps) {}

  /**
   * Pairs every unassociated participant with a random unassociated gift.
   * Existing associations are left as they are. Throws `PairingError`
   * (`INSUFFICIENT_POOL`) without writing anything when gifts run short.
   */
  async associate(): Promise<AssociateResult> {
    const { participantRepo, giftRepo, associationRepo, random } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      await associationRepo.lockPools(tx);

      const participants = await participantRepo.listUnassociated(tx);
      const gifts = await giftRepo.listUnassociated(tx);

      const draw = pairParticipantsWithGifts(participants, gifts, random);
      if (draw.status === 'nothing-to-pair') {
        return draw;
      }

      const associations = await associationRepo.createMany(tx, draw.associations);
      return { ...draw, associations };
    });
  }

  async listAssociations(): Promise<Association[]> {
    return this.deps.withTransaction((tx) => this.deps.associationRepo.list(tx));
  }

  /** Archives the participant's association; the gift becomes available again. */
  async removeAssociation(participant: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const exists = await this.deps.participantRepo.exists(tx, participant);
      if (!exists) {
        throw new RosterError('NOT_FOUND', `Participant '${participant}' does not exist`);
      }
      const archived = await this.deps.associationRepo.archiveByParticipant(tx, participant);
      if (!archived) {
        throw new RosterError('NOT_FOUND', `Participant '${participant}' has no association`);
      }
    });
  }

  async resetAssociations(): Promise<number> {
    return this.deps.withTransaction((tx) => this.deps.associationRepo.archiveAll(tx));
  }

  /** Stateless draw over the pools given; nothing is stored. */
  drawCouples(input: { men: number[]; women: number[] }): CoupleDraw | NothingToPair {
    return pairCrossThenSameKind(input.men, input.women, this.deps.random);
  }
}
