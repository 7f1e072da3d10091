import { randomInt } from 'node:crypto';
import { type Random } from '@giftpair/domain';

export const cryptoRandom: Random = {
  nextInt(maxExclusive: number): number {
    return randomInt(maxExclusive);
  },
};

/**
 * Deterministic source (mulberry32) for reproducible draws. Not suitable
 * where the outcome must be unpredictable.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    nextInt(maxExclusive: number): number {
      return Math.floor(next() * maxExclusive);
    },
  };
}
