import { type Admin } from './admin';
import { type Credential, type RevocationRecord, type TokenKind } from './credential';
import { type Association, type Gift, type Participant } from './roster';
import { type NewAssociation } from './pairing';

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface AdminRepository {
  create(tx: unknown, admin: { id: string; username: string; passwordHash: string }): Promise<Admin>;
  findByUsername(tx: unknown, username: string): Promise<Admin | null>;
  findById(tx: unknown, id: string): Promise<Admin | null>;
  list(tx: unknown): Promise<Admin[]>;
  updatePassword(tx: unknown, id: string, passwordHash: string): Promise<void>;
  delete(tx: unknown, id: string): Promise<boolean>;
}

/** Blocklist of token identifiers, keyed by `jti`. */
export interface RevocationStore {
  contains(jti: string): Promise<boolean>;
  /** Inserting a `jti` that is already present is a no-op. */
  insert(record: RevocationRecord): Promise<void>;
  deleteExpired(before: Date): Promise<number>;
}

export interface ParticipantRepository {
  /** Returns false when an active participant with that name exists. */
  add(tx: unknown, name: string): Promise<boolean>;
  archive(tx: unknown, name: string): Promise<boolean>;
  exists(tx: unknown, name: string): Promise<boolean>;
  list(tx: unknown): Promise<Participant[]>;
  listUnassociated(tx: unknown): Promise<string[]>;
  count(tx: unknown): Promise<number>;
  deleteAll(tx: unknown): Promise<number>;
}

export interface GiftRepository {
  /** Returns false when an active gift with that number exists. */
  add(tx: unknown, gift: number): Promise<boolean>;
  archive(tx: unknown, gift: number): Promise<boolean>;
  list(tx: unknown): Promise<Gift[]>;
  listUnassociated(tx: unknown): Promise<number[]>;
  count(tx: unknown): Promise<number>;
  deleteAll(tx: unknown): Promise<number>;
}

export interface AssociationRepository {
  /** Serializes pairing runs for the rest of the transaction. */
  lockPools(tx: unknown): Promise<void>;
  createMany(tx: unknown, associations: NewAssociation[]): Promise<Association[]>;
  list(tx: unknown): Promise<Association[]>;
  archiveByParticipant(tx: unknown, participant: string): Promise<boolean>;
  archiveByGift(tx: unknown, gift: number): Promise<boolean>;
  archiveAll(tx: unknown): Promise<number>;
  count(tx: unknown): Promise<number>;
  deleteAll(tx: unknown): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
  /** True when a stored hash should be replaced on the next successful login. */
  needsRehash(hash: string): boolean;
}

export interface TokenService {
  issueAccessToken(subjectId: string, username?: string): Promise<string>;
  issueRefreshToken(subjectId: string): Promise<string>;
  verify(token: string, expectedKind: TokenKind): Promise<Credential>;
  /** Signature and claims only: no expiry, kind or blocklist check. */
  inspect(token: string): Promise<Credential>;
  revoke(token: string): Promise<void>;
  refreshAccess(refreshToken: string, resolveUsername?: (subjectId: string) => Promise<string | undefined>): Promise<string>;
}
