import { type AssociationKind } from './roster';

/** Source of uniformly distributed integers in `[0, maxExclusive)`. */
export interface Random {
  nextInt(maxExclusive: number): number;
}

export type CoupleKind = 'H-F' | 'F-F' | 'H-H';

export interface Couple {
  kind: CoupleKind;
  first: number;
  second: number;
}

export interface NothingToPair {
  status: 'nothing-to-pair';
}

export interface CoupleDraw {
  status: 'paired';
  couples: Couple[];
  counts: Record<CoupleKind, number>;
  unpaired: number[];
  totalPeople: number;
}

export interface NewAssociation {
  participant: string;
  gift: number;
  kind: AssociationKind;
}

export interface AssociationDraw {
  status: 'paired';
  associations: NewAssociation[];
  counts: Record<AssociationKind, number>;
  leftoverGifts: number[];
}

export class PairingError extends Error {
  constructor(
    public readonly kind: 'INSUFFICIENT_POOL' | 'DUPLICATE_IDENTIFIER',
    message: string,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'PairingError';
  }
}

/**
 * Fisher–Yates shuffle. Returns a new array; the input is left untouched.
 */
export function shuffle<T>(items: readonly T[], random: Random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    if (!Number.isInteger(j) || j < 0 || j > i) {
      throw new RangeError(`Random source returned ${j}, expected an integer in [0, ${i}]`);
    }
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

function assertDistinct<T>(items: readonly T[], label: string): void {
  const seen = new Set<T>();
  for (const item of items) {
    if (seen.has(item)) {
      throw new PairingError('DUPLICATE_IDENTIFIER', `Identifier ${String(item)} appears twice in ${label}`, {
        identifier: item,
      });
    }
    seen.add(item);
  }
}

/**
 * Pairs one man with one woman while both pools last, then exhausts the
 * leftovers two at a time (women first, then men). An odd identifier left at
 * the end is reported in `unpaired`.
 */
export function pairCrossThenSameKind(
  men: readonly number[],
  women: readonly number[],
  random: Random,
): CoupleDraw | NothingToPair {
  if (men.length === 0 && women.length === 0) {
    return { status: 'nothing-to-pair' };
  }
  assertDistinct([...men, ...women], 'the pools');

  const menLeft = shuffle(men, random);
  const womenLeft = shuffle(women, random);
  const couples: Couple[] = [];

  while (menLeft.length > 0 && womenLeft.length > 0) {
    couples.push({ kind: 'H-F', first: takeLast(menLeft), second: takeLast(womenLeft) });
  }
  pairWithinPool(womenLeft, 'F-F', couples);
  pairWithinPool(menLeft, 'H-H', couples);

  const counts: Record<CoupleKind, number> = { 'H-F': 0, 'F-F': 0, 'H-H': 0 };
  for (const couple of couples) counts[couple.kind]++;

  return {
    status: 'paired',
    couples,
    counts,
    unpaired: [...womenLeft, ...menLeft],
    totalPeople: men.length + women.length,
  };
}

function pairWithinPool(pool: number[], kind: CoupleKind, into: Couple[]): void {
  while (pool.length >= 2) {
    const first = takeLast(pool);
    into.push({ kind, first, second: takeLast(pool) });
  }
}

function takeLast(pool: number[]): number {
  const value = pool.pop();
  if (value === undefined) throw new Error('Cannot take from an empty pool');
  return value;
}

/**
 * Gives every unassociated participant one gift drawn from the shuffled
 * unassociated gifts. Callers pass only identifiers that are not in an active
 * association; existing associations are never touched.
 */
export function pairParticipantsWithGifts(
  participants: readonly string[],
  gifts: readonly number[],
  random: Random,
): AssociationDraw | NothingToPair {
  if (participants.length === 0) {
    return { status: 'nothing-to-pair' };
  }
  if (participants.length > gifts.length) {
    throw new PairingError(
      'INSUFFICIENT_POOL',
      `Not enough gifts: ${participants.length} participant(s) for ${gifts.length} gift(s)`,
      { participants: participants.length, gifts: gifts.length },
    );
  }
  assertDistinct(participants, 'participants');
  assertDistinct(gifts, 'gifts');

  const drawn = shuffle(gifts, random);
  const associations: NewAssociation[] = participants.map((participant, index): NewAssociation => ({
    participant,
    gift: drawn[index],
    kind: 'participant-gift',
  }));

  return {
    status: 'paired',
    associations,
    counts: { 'participant-gift': associations.length },
    leftoverGifts: drawn.slice(participants.length),
  };
}
