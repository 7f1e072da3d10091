import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@giftpair/shared';
import { TokenError, type TokenService } from '@giftpair/domain';

declare module 'fastify' {
  interface FastifyRequest {
    adminId?: string;
    accessToken?: string;
  }
}

const logger = createLogger({ name: 'api:auth' });

function readBodyField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Reads the bearer token from the Authorization header, falling back to a body
 * field. The header wins when both are present.
 */
export function extractCredential(request: FastifyRequest, bodyField: string): string {
  const header = request.headers.authorization;
  if (header !== undefined) {
    const match = /^Bearer\s+(\S+)$/.exec(header);
    if (!match) {
      throw new TokenError('MALFORMED', 'Authorization header must be "Bearer <token>"');
    }
    return match[1];
  }

  const fromBody = readBodyField(request.body, bodyField);
  if (fromBody === undefined) {
    throw new TokenError('MISSING_CREDENTIAL', 'No token was presented');
  }
  return fromBody;
}

export function toUnauthorized(err: unknown): never {
  if (err instanceof TokenError) {
    throw AppError.fromKind(ErrorCode.UNAUTHORIZED, err);
  }
  throw err;
}

/** Accepts access tokens only; failures become 401 with the token error kind as `reason`. */
export function createAuthMiddleware(tokenService: TokenService) {
  return async function authenticate(request: FastifyRequest) {
    try {
      const token = extractCredential(request, 'token');
      const credential = await tokenService.verify(token, 'access');
      request.adminId = credential.sub;
      request.accessToken = token;
    } catch (err) {
      if (err instanceof TokenError) {
        logger.warn({ reason: err.kind, url: request.url, requestId: request.id }, 'Authentication failed');
      }
      toUnauthorized(err);
    }
  };
}

/** The authenticated admin; only valid behind the `authenticate` pre-handler. */
export function requireAdmin(request: FastifyRequest): { adminId: string; accessToken: string } {
  if (request.adminId === undefined || request.accessToken === undefined) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required', { reason: 'MISSING_CREDENTIAL' });
  }
  return { adminId: request.adminId, accessToken: request.accessToken };
}
