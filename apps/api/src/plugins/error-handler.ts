import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@giftpair/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof AppError) {
      const meta = { code: error.code, reason: error.reason, ...error.safeMeta };
      if (error.isServerError) {
        logger.error(meta, error.message);
      } else {
        logger.warn(meta, error.message);
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Body parser failures (invalid JSON, wrong content type) carry a 4xx status.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ code: ErrorCode.BAD_REQUEST, fastifyCode: error.code }, error.message);
      return reply.status(error.statusCode).send({ code: ErrorCode.BAD_REQUEST, message: error.message });
    }

    logger.error({ err: error.message }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: ErrorCode.NOT_FOUND,
      message: `Route ${request.method} ${request.url} not found`,
    });
  });
}
