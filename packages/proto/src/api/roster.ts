import { z } from 'zod';

/** Numbers are accepted as names and stored in their decimal form. */
export const ParticipantNameSchema = z
  .union([z.string(), z.number().finite()], {
    errorMap: () => ({ message: 'Participant must be a string or a number' }),
  })
  .transform((value) => String(value).trim())
  .pipe(
    z
      .string()
      .min(1, 'Participant name cannot be empty')
      .max(255, 'Participant name must be at most 255 characters'),
  );

/** Fractional gift numbers are truncated toward zero. */
/** Bounds of the `INTEGER` columns gift numbers are stored in. */
const GIFT_NUMBER_MIN = -2_147_483_648;
const GIFT_NUMBER_MAX = 2_147_483_647;

const GiftRangeSchema = z
  .number()
  .int()
  .min(GIFT_NUMBER_MIN, 'Gift number is out of range')
  .max(GIFT_NUMBER_MAX, 'Gift number is out of range');

export const GiftNumberSchema = z
  .number({ invalid_type_error: 'Gift must be a number' })
  .finite()
  .transform((value) => Math.trunc(value))
  .pipe(GiftRangeSchema);

export const AddParticipantRequestSchema = z.object({
  participant: ParticipantNameSchema,
});

/** Blank and null entries are dropped; at least one name must remain. */
export const BulkParticipantsRequestSchema = z.object({
  participants: z
    .array(z.unknown(), {
      required_error: 'A list of participants is required',
      invalid_type_error: 'Participants must be a list',
    })
    .transform((values) =>
      values
        .filter((value): value is string | number => typeof value === 'string' || typeof value === 'number')
        .map((value) => String(value).trim())
        .filter((value) => value.length > 0),
    )
    .pipe(z.array(z.string().max(255)).min(1, 'No valid participant in the list')),
});

export const AddGiftRequestSchema = z.object({
  gift: GiftNumberSchema,
});

export const BulkGiftsRequestSchema = z.object({
  gifts: z
    .array(GiftNumberSchema, {
      required_error: 'A list of gifts is required',
      invalid_type_error: 'Gifts must be a list',
    })
    .min(1, 'The list of gifts is empty'),
});

export const ParticipantParamsSchema = z.object({
  name: ParticipantNameSchema,
});

export const AssociationParamsSchema = z.object({
  participant: ParticipantNameSchema,
});

export const GiftParamsSchema = z.object({
  gift: z.coerce
    .number({ invalid_type_error: 'Gift must be a number' })
    .int('Gift must be an integer')
    .pipe(GiftRangeSchema),
});

export type AddParticipantRequest = z.infer<typeof AddParticipantRequestSchema>;
export type BulkParticipantsRequest = z.infer<typeof BulkParticipantsRequestSchema>;
export type AddGiftRequest = z.infer<typeof AddGiftRequestSchema>;
export type BulkGiftsRequest = z.infer<typeof BulkGiftsRequestSchema>;
