import { buildServer } from './server';
import { loadConfig, ApiConfigSchema, createLogger } from '@giftpair/shared';
import {
  initPool,
  closePool,
  getPool,
  checkConnection,
  withTransaction,
  PgAdminRepository,
  PgRevocationStore,
  PgParticipantRepository,
  PgGiftRepository,
  PgAssociationRepository,
} from '@giftpair/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });
  await checkConnection();

  const app = await buildServer(
    {
      jwtSecret: config.JWT_SECRET,
      jwtAlgorithm: config.JWT_ALGORITHM,
      jwtIssuer: config.JWT_ISSUER,
      jwtAccessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
      jwtRefreshTokenTtl: config.JWT_REFRESH_TOKEN_TTL,
      registrationEnabled: config.ADMIN_REGISTRATION_ENABLED,
      pairingSeed: config.PAIRING_SEED,
      argon2: { memoryCost: config.ARGON2_MEMORY_COST, timeCost: config.ARGON2_TIME_COST },
    },
    {
      adminRepo: new PgAdminRepository(),
      participantRepo: new PgParticipantRepository(),
      giftRepo: new PgGiftRepository(),
      associationRepo: new PgAssociationRepository(),
      revocationStore: new PgRevocationStore(getPool()),
      withTransaction,
    },
  );

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT, registrationEnabled: config.ADMIN_REGISTRATION_ENABLED }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
