import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@giftpair/shared';
import { PairingError, type AssociationService, type Association } from '@giftpair/domain';
import {
  DrawCouplesRequestSchema,
  AssociationParamsSchema,
  BULK_FIELD_ALIASES,
  resolveAliasedFields,
} from '@giftpair/proto';
import { type createAuthMiddleware } from '../plugins/auth';
import { mapRosterError } from './roster';

const logger = createLogger({ name: 'api:pairing' });

interface PairingRouteDeps {
  associationService: AssociationService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

const PAIRING_ERROR_CODES: Record<PairingError['kind'], ErrorCode> = {
  INSUFFICIENT_POOL: ErrorCode.CONFLICT,
  DUPLICATE_IDENTIFIER: ErrorCode.VALIDATION,
};

function mapPairingError(err: unknown): never {
  if (err instanceof PairingError) {
    throw AppError.fromKind(PAIRING_ERROR_CODES[err.kind], err);
  }
  return mapRosterError(err);
}

function serializeAssociation(association: Association) {
  return {
    id: association.id,
    participant: association.participant,
    gift: association.gift,
    kind: association.kind,
    createdAt: association.createdAt.toISOString(),
  };
}

export function registerPairingRoutes(app: FastifyInstance, deps: PairingRouteDeps): void {
  const { associationService, authenticate } = deps;

  app.post('/associate', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const result = await associationService.associate();
      if (result.status === 'nothing-to-pair') {
        logger.info({ requestId: request.id }, 'No participant waiting for a gift');
        return reply.status(200).send({ status: result.status, message: 'Every participant already has a gift' });
      }

      logger.info(
        { requestId: request.id, created: result.counts['participant-gift'], leftoverGifts: result.leftoverGifts.length },
        'Associations created',
      );
      return reply.status(200).send({
        status: result.status,
        associations: result.associations.map(serializeAssociation),
        counts: result.counts,
        leftoverGifts: result.leftoverGifts,
      });
    } catch (err) {
      if (err instanceof PairingError) {
        logger.warn({ requestId: request.id, reason: err.kind, ...err.meta }, 'Association run refused');
      }
      return mapPairingError(err);
    }
  });

  app.get('/associations', async (_request, reply) => {
    const associations = await associationService.listAssociations();
    return reply.status(200).send({
      associations: associations.map(serializeAssociation),
      total: associations.length,
    });
  });

  app.delete('/associations/:participant', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = AssociationParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid participant', parsed.error);
    }

    try {
      await associationService.removeAssociation(parsed.data.participant);
      return reply.status(204).send();
    } catch (err) {
      return mapRosterError(err);
    }
  });

  app.delete('/associations', { preHandler: [authenticate] }, async (_request, reply) => {
    const archived = await associationService.resetAssociations();
    return reply.status(200).send({ archived });
  });

  app.post('/couples/draw', { preHandler: [authenticate] }, async (request, reply) => {
    const body = resolveAliasedFields(request.body, BULK_FIELD_ALIASES, ['men', 'women']);
    const parsed = DrawCouplesRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid pools', parsed.error);
    }

    try {
      const draw = associationService.drawCouples(parsed.data);
      return reply.status(200).send(draw);
    } catch (err) {
      return mapPairingError(err);
    }
  });
}
