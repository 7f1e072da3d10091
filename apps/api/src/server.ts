import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import {
  createLogger,
  JoseTokenService,
  Argon2PasswordHasher,
  cryptoRandom,
  createSeededRandom,
  type Argon2Params,
} from '@giftpair/shared';
import {
  AuthService,
  RosterService,
  AssociationService,
  type AdminRepository,
  type AssociationRepository,
  type GiftRepository,
  type ParticipantRepository,
  type PasswordHasher,
  type RevocationStore,
  type WithTransaction,
} from '@giftpair/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { registerAuthRoutes } from './routes/auth';
import { registerRosterRoutes } from './routes/roster';
import { registerPairingRoutes } from './routes/pairing';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  jwtSecret: string;
  jwtAlgorithm: 'HS256' | 'HS384' | 'HS512';
  jwtIssuer: string;
  jwtAccessTokenTtl: number;
  jwtRefreshTokenTtl: number;
  registrationEnabled: boolean;
  pairingSeed?: number;
  /** Costs for the default hasher; ignored when `deps.passwordHasher` is given. */
  argon2?: Partial<Argon2Params>;
}

/** Storage collaborators; PostgreSQL in production, in-memory stand-ins in tests. */
export interface ServerDeps {
  adminRepo: AdminRepository;
  participantRepo: ParticipantRepository;
  giftRepo: GiftRepository;
  associationRepo: AssociationRepository;
  revocationStore: RevocationStore;
  withTransaction: WithTransaction;
  passwordHasher?: PasswordHasher;
  now?: () => number;
}

export async function buildServer(config: ServerConfig, deps: ServerDeps) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
  });

  registerErrorHandler(app);

  const tokenService = new JoseTokenService(
    {
      secret: config.jwtSecret,
      algorithm: config.jwtAlgorithm,
      issuer: config.jwtIssuer,
      accessTokenTtl: config.jwtAccessTokenTtl,
      refreshTokenTtl: config.jwtRefreshTokenTtl,
      now: deps.now,
    },
    deps.revocationStore,
  );

  const authService = new AuthService({
    adminRepo: deps.adminRepo,
    passwordHasher: deps.passwordHasher ?? new Argon2PasswordHasher(config.argon2),
    tokenService,
    generateId: () => randomUUID(),
    withTransaction: deps.withTransaction,
    registrationEnabled: config.registrationEnabled,
  });

  const rosterService = new RosterService({
    participantRepo: deps.participantRepo,
    giftRepo: deps.giftRepo,
    associationRepo: deps.associationRepo,
    withTransaction: deps.withTransaction,
  });

  const associationService = new AssociationService({
    participantRepo: deps.participantRepo,
    giftRepo: deps.giftRepo,
    associationRepo: deps.associationRepo,
    random: config.pairingSeed === undefined ? cryptoRandom : createSeededRandom(config.pairingSeed),
    withTransaction: deps.withTransaction,
  });

  const authenticate = createAuthMiddleware(tokenService);

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAuthRoutes(app, { authService, authenticate });
  registerRosterRoutes(app, { rosterService, authenticate });
  registerPairingRoutes(app, { associationService, authenticate });

  app.addHook('onRequest', (_request, _reply, done) => {
    logger.info(
      { method: _request.method, url: _request.url, requestId: _request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (_request, reply, done) => {
    logger.info(
      { method: _request.method, url: _request.url, statusCode: reply.statusCode, requestId: _request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
