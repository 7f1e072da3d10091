import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@giftpair/shared';
import { AuthError, TokenError, type AuthService } from '@giftpair/domain';
import { RegisterRequestSchema, LoginRequestSchema, RefreshRequestSchema, LogoutRequestSchema } from '@giftpair/proto';
import { type createAuthMiddleware, extractCredential, requireAdmin, toUnauthorized } from '../plugins/auth';

const logger = createLogger({ name: 'api:auth' });

interface AuthRouteDeps {
  authService: AuthService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

const AUTH_ERROR_CODES: Record<AuthError['kind'], ErrorCode> = {
  UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
  CONFLICT: ErrorCode.CONFLICT,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  NOT_FOUND: ErrorCode.NOT_FOUND,
};

function mapAuthError(err: unknown): never {
  if (err instanceof AuthError) {
    throw new AppError(AUTH_ERROR_CODES[err.kind], err.message);
  }
  if (err instanceof TokenError) {
    logger.warn({ reason: err.kind }, 'Token rejected');
    return toUnauthorized(err);
  }
  throw err;
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService, authenticate } = deps;

  app.post('/auth/register', async (request, reply) => {
    const parsed = RegisterRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid registration data', parsed.error);
    }

    try {
      const admin = await authService.register(parsed.data);
      logger.info({ adminId: admin.id, username: admin.username }, 'Admin registered');
      return reply.status(201).send({
        id: admin.id,
        username: admin.username,
        createdAt: admin.createdAt.toISOString(),
      });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/login', async (request, reply) => {
    const parsed = LoginRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid login data', parsed.error);
    }

    try {
      const result = await authService.login(parsed.data);
      logger.info({ adminId: result.admin.id }, 'Admin logged in');
      return reply.status(200).send({
        accessToken: result.accessToken,
        refreshToken: result.refreshToken,
        admin: {
          id: result.admin.id,
          username: result.admin.username,
          createdAt: result.admin.createdAt.toISOString(),
        },
      });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/refresh', async (request, reply) => {
    const parsed = RefreshRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw AppError.fromZod('Invalid refresh request', parsed.error);
    }

    try {
      const token = extractCredential(request, 'refreshToken');
      const result = await authService.refresh(token);
      return reply.status(200).send({ accessToken: result.accessToken });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/auth/logout', { preHandler: [authenticate] }, async (request, reply) => {
    const { adminId, accessToken } = requireAdmin(request);
    const parsed = LogoutRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw AppError.fromZod('Invalid logout request', parsed.error);
    }

    try {
      await authService.logout({ adminId, accessToken, refreshToken: parsed.data.refreshToken });
      logger.info({ adminId, refreshRevoked: parsed.data.refreshToken !== undefined }, 'Admin logged out');
      return reply.status(204).send();
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.get('/auth/me', { preHandler: [authenticate] }, async (request, reply) => {
    const { adminId } = requireAdmin(request);
    const admin = await authService.getMe(adminId);
    if (!admin) {
      throw new AppError(ErrorCode.NOT_FOUND, 'Admin not found');
    }
    return reply.status(200).send({
      id: admin.id,
      username: admin.username,
      createdAt: admin.createdAt.toISOString(),
    });
  });
}
