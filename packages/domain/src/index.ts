export type { Admin, AdminProfile } from './admin';
export { toAdminProfile } from './admin';
export type { TokenKind, Credential, RevocationRecord, TokenErrorKind } from './credential';
export { TokenError, isCredentialExpired } from './credential';
export type {
  Participant,
  Gift,
  Association,
  AssociationKind,
  RosterCounts,
  BulkAddResult,
} from './roster';
export type {
  Random,
  Couple,
  CoupleKind,
  CoupleDraw,
  NothingToPair,
  NewAssociation,
  AssociationDraw,
} from './pairing';
export { PairingError, shuffle, pairCrossThenSameKind, pairParticipantsWithGifts } from './pairing';
export type {
  WithTransaction,
  AdminRepository,
  RevocationStore,
  ParticipantRepository,
  GiftRepository,
  AssociationRepository,
  PasswordHasher,
  TokenService,
} from './ports';
export { AuthService, AuthError, type AuthServiceDeps, type LoginResult } from './auth-service';
export {
  RosterService,
  RosterError,
  type RosterServiceDeps,
  type RosterStatus,
  type PoolStatus,
} from './roster-service';
export {
  AssociationService,
  type AssociationServiceDeps,
  type AssociateResult,
} from './association-service';
export { createInMemoryRoster, createInMemoryAdminRepository, inlineTransaction } from './testing/in-memory';
