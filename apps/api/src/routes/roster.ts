import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@giftpair/shared';
import { RosterError, type RosterService } from '@giftpair/domain';
import {
  AddParticipantRequestSchema,
  BulkParticipantsRequestSchema,
  AddGiftRequestSchema,
  BulkGiftsRequestSchema,
  ParticipantParamsSchema,
  GiftParamsSchema,
  BULK_FIELD_ALIASES,
  SINGLE_FIELD_ALIASES,
  resolveAliasedFields,
} from '@giftpair/proto';
import { type createAuthMiddleware } from '../plugins/auth';

interface RosterRouteDeps {
  rosterService: RosterService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

const ROSTER_ERROR_CODES: Record<RosterError['kind'], ErrorCode> = {
  CONFLICT: ErrorCode.CONFLICT,
  NOT_FOUND: ErrorCode.NOT_FOUND,
};

export function mapRosterError(err: unknown): never {
  if (err instanceof RosterError) {
    throw new AppError(ROSTER_ERROR_CODES[err.kind], err.message);
  }
  throw err;
}

export function registerRosterRoutes(app: FastifyInstance, deps: RosterRouteDeps): void {
  const { rosterService, authenticate } = deps;

  app.post('/participants', { preHandler: [authenticate] }, async (request, reply) => {
    const body = resolveAliasedFields(request.body, SINGLE_FIELD_ALIASES, ['participant']);
    const parsed = AddParticipantRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid participant', parsed.error);
    }

    try {
      await rosterService.addParticipant(parsed.data.participant);
      return reply.status(201).send({ participant: parsed.data.participant });
    } catch (err) {
      return mapRosterError(err);
    }
  });

  app.post('/participants/bulk', { preHandler: [authenticate] }, async (request, reply) => {
    const body = resolveAliasedFields(request.body, BULK_FIELD_ALIASES, ['participants']);
    const parsed = BulkParticipantsRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid participant list', parsed.error);
    }

    const result = await rosterService.addParticipants(parsed.data.participants);
    return reply.status(201).send({ ...result, totalProcessed: parsed.data.participants.length });
  });

  app.get('/participants', async (_request, reply) => {
    const participants = await rosterService.listParticipants();
    return reply.status(200).send({
      participants: participants.map((p) => ({
        name: p.name,
        gift: p.gift,
        createdAt: p.createdAt.toISOString(),
      })),
      total: participants.length,
    });
  });

  app.delete('/participants/:name', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = ParticipantParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid participant', parsed.error);
    }

    try {
      await rosterService.removeParticipant(parsed.data.name);
      return reply.status(204).send();
    } catch (err) {
      return mapRosterError(err);
    }
  });

  app.post('/gifts', { preHandler: [authenticate] }, async (request, reply) => {
    const body = resolveAliasedFields(request.body, SINGLE_FIELD_ALIASES, ['gift']);
    const parsed = AddGiftRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid gift', parsed.error);
    }

    try {
      await rosterService.addGift(parsed.data.gift);
      return reply.status(201).send({ gift: parsed.data.gift });
    } catch (err) {
      return mapRosterError(err);
    }
  });

  app.post('/gifts/bulk', { preHandler: [authenticate] }, async (request, reply) => {
    const body = resolveAliasedFields(request.body, BULK_FIELD_ALIASES, ['gifts']);
    const parsed = BulkGiftsRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid gift list', parsed.error);
    }

    const result = await rosterService.addGifts(parsed.data.gifts);
    return reply.status(201).send({ ...result, totalProcessed: parsed.data.gifts.length });
  });

  app.get('/gifts', async (_request, reply) => {
    const gifts = await rosterService.listGifts();
    return reply.status(200).send({
      gifts: gifts.map((g) => ({
        number: g.number,
        associated: g.associated,
        createdAt: g.createdAt.toISOString(),
      })),
      total: gifts.length,
    });
  });

  app.delete('/gifts/:gift', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = GiftParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw AppError.fromZod('Invalid gift', parsed.error);
    }

    try {
      await rosterService.removeGift(parsed.data.gift);
      return reply.status(204).send();
    } catch (err) {
      return mapRosterError(err);
    }
  });

  app.get('/status', async (_request, reply) => {
    const status = await rosterService.getStatus();
    return reply.status(200).send(status);
  });

  app.delete('/reset', { preHandler: [authenticate] }, async (_request, reply) => {
    const deleted = await rosterService.reset();
    return reply.status(200).send({ deleted });
  });
}
