import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AssociationService, type AssociationServiceDeps } from '../association-service';
import { PairingError, type Random } from '../pairing';
import { RosterError } from '../roster-service';
import { createInMemoryRoster } from '../testing/in-memory';

const identity: Random = { nextInt: (max) => max - 1 };

function createDeps(overrides: Partial<AssociationServiceDeps> = {}): AssociationServiceDeps {
  return {
    ...createInMemoryRoster(),
    random: identity,
    withTransaction: vi.fn(async <T>(fn: (tx: unknown) => Promise<T>) => fn({})),
    ...overrides,
  };
}

async function seed(deps: AssociationServiceDeps, participants: string[], gifts: number[]) {
  for (const name of participants) await deps.participantRepo.add({}, name);
  for (const gift of gifts) await deps.giftRepo.add({}, gift);
}

describe('AssociationService', () => {
  let deps: AssociationServiceDeps;
  let service: AssociationService;

  beforeEach(() => {
    deps = createDeps();
    service = new AssociationService(deps);
  });

  describe('associate', () => {
    it('pairs two participants with two of three gifts', async () => {
      await seed(deps, ['Alice', 'Bob'], [10, 20, 30]);

      const result = await service.associate();

      if (result.status !== 'paired') throw new Error('expected a draw');
      expect(result.associations.map((a) => [a.participant, a.gift])).toEqual([
        ['Alice', 10],
        ['Bob', 20],
      ]);
      expect(result.counts).toEqual({ 'participant-gift': 2 });
      expect(result.leftoverGifts).toEqual([30]);
      expect(await deps.giftRepo.listUnassociated({})).toEqual([30]);
    });

    it('takes the pool lock before reading the pools', async () => {
      const order: string[] = [];
      const lockPools = vi.spyOn(deps.associationRepo, 'lockPools').mockImplementation(async () => {
        order.push('lock');
      });
      const listUnassociated = vi.spyOn(deps.participantRepo, 'listUnassociated');
      listUnassociated.mockImplementation(async () => {
        order.push('read');
        return [];
      });

      await service.associate();

      expect(lockPools).toHaveBeenCalledOnce();
      expect(order).toEqual(['lock', 'read']);
    });

    it('leaves earlier associations untouched', async () => {
      await seed(deps, ['Alice'], [10, 20, 30]);
      await service.associate();
      const before = await service.listAssociations();

      await seed(deps, ['Bob'], []);
      const result = await service.associate();

      if (result.status !== 'paired') throw new Error('expected a draw');
      expect(result.associations).toHaveLength(1);
      expect(result.associations[0].participant).toBe('Bob');
      expect(result.associations[0].gift).not.toBe(before[0].gift);

      const after = await service.listAssociations();
      expect(after[0]).toEqual(before[0]);
      expect(after).toHaveLength(2);
    });

    it('fails with INSUFFICIENT_POOL and writes nothing', async () => {
      await seed(deps, ['Alice', 'Bob', 'Carl'], [10]);
      const createMany = vi.spyOn(deps.associationRepo, 'createMany');

      await expect(service.associate()).rejects.toBeInstanceOf(PairingError);
      await expect(service.associate()).rejects.toMatchObject({ kind: 'INSUFFICIENT_POOL' });

      expect(createMany).not.toHaveBeenCalled();
      expect(await service.listAssociations()).toEqual([]);
      expect(await deps.giftRepo.listUnassociated({})).toEqual([10]);
    });

    it('returns nothing-to-pair on a second run with no pool change', async () => {
      await seed(deps, ['Alice', 'Bob'], [10, 20, 30]);

      const first = await service.associate();
      const second = await service.associate();

      expect(first.status).toBe('paired');
      expect(second).toEqual({ status: 'nothing-to-pair' });
      expect(await service.listAssociations()).toHaveLength(2);
    });

    it('returns nothing-to-pair when both pools are empty', async () => {
      expect(await service.associate()).toEqual({ status: 'nothing-to-pair' });
    });
  });

  describe('removeAssociation', () => {
    it('frees the gift for the next run', async () => {
      await seed(deps, ['Alice'], [10]);
      await service.associate();

      await service.removeAssociation('Alice');

      expect(await service.listAssociations()).toEqual([]);
      expect(await deps.giftRepo.listUnassociated({})).toEqual([10]);
    });

    it('rejects an unknown participant', async () => {
      await expect(service.removeAssociation('Nobody')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
        message: "Participant 'Nobody' does not exist",
      });
    });

    it('rejects a participant without association', async () => {
      await seed(deps, ['Alice'], []);

      await expect(service.removeAssociation('Alice')).rejects.toThrow(RosterError);
      await expect(service.removeAssociation('Alice')).rejects.toThrow("Participant 'Alice' has no association");
    });
  });

  describe('resetAssociations', () => {
    it('archives every active association', async () => {
      await seed(deps, ['Alice', 'Bob'], [10, 20]);
      await service.associate();

      expect(await service.resetAssociations()).toBe(2);
      expect(await service.listAssociations()).toEqual([]);
      expect(await deps.participantRepo.listUnassociated({})).toEqual(['Alice', 'Bob']);
    });
  });

  describe('drawCouples', () => {
    it('runs the cross-then-same-kind draw with the injected source', () => {
      const draw = service.drawCouples({ men: [10, 11], women: [1, 2, 3, 4] });

      expect(draw).toMatchObject({
        status: 'paired',
        counts: { 'H-F': 2, 'F-F': 1, 'H-H': 0 },
        unpaired: [],
      });
    });

    it('reports nothing-to-pair for empty pools', () => {
      expect(service.drawCouples({ men: [], women: [] })).toEqual({ status: 'nothing-to-pair' });
    });
  });
});
