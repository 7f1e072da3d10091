import { hash, verify } from '@node-rs/argon2';
import { type PasswordHasher } from '@giftpair/domain';

export interface Argon2Params {
  /** KiB. */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export const DEFAULT_ARGON2_PARAMS: Argon2Params = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

const OUTPUT_LENGTH = 32;

/** Reads `m`, `t` and `p` from a `$argon2id$v=19$m=..,t=..,p=..$salt$hash` string. */
export function parseArgon2Params(passwordHash: string): Argon2Params | null {
  const [empty, variant, , params] = passwordHash.split('$');
  if (empty !== '' || variant !== 'argon2id' || params === undefined) {
    return null;
  }

  const values = new Map<string, number>();
  for (const pair of params.split(',')) {
    const [key, raw] = pair.split('=');
    const value = Number(raw);
    if (!Number.isInteger(value)) return null;
    values.set(key, value);
  }

  const memoryCost = values.get('m');
  const timeCost = values.get('t');
  const parallelism = values.get('p');
  if (memoryCost === undefined || timeCost === undefined || parallelism === undefined) {
    return null;
  }
  return { memoryCost, timeCost, parallelism };
}

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly params: Argon2Params;

  constructor(params: Partial<Argon2Params> = {}) {
    this.params = { ...DEFAULT_ARGON2_PARAMS, ...params };
  }

  async hash(password: string): Promise<string> {
    return hash(password, { ...this.params, outputLen: OUTPUT_LENGTH });
  }

  /** A hash that argon2 cannot parse verifies as false rather than throwing. */
  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (parseArgon2Params(passwordHash) === null) return false;
    try {
      return await verify(passwordHash, password);
    } catch {
      return false;
    }
  }

  /** True when the stored hash was made with other cost parameters than the configured ones. */
  needsRehash(passwordHash: string): boolean {
    const stored = parseArgon2Params(passwordHash);
    return (
      stored === null ||
      stored.memoryCost !== this.params.memoryCost ||
      stored.timeCost !== this.params.timeCost ||
      stored.parallelism !== this.params.parallelism
    );
  }
}
