export { initPool, closePool, getPool, checkConnection, withTransaction } from './client';
export { runMigrations } from './migrator';
export { PgAdminRepository } from './repositories/admin-repository';
export { PgRevocationStore } from './repositories/revocation-store';
export { PgParticipantRepository } from './repositories/participant-repository';
export { PgGiftRepository } from './repositories/gift-repository';
export { PgAssociationRepository } from './repositories/association-repository';
