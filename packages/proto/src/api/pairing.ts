import { z } from 'zod';

function personNumber(label: string) {
  return z
    .number({ invalid_type_error: `Every entry of '${label}' must be a number` })
    .finite()
    .transform((value) => Math.trunc(value));
}

function poolSchema(label: string) {
  return z
    .array(personNumber(label), {
      required_error: `The list '${label}' is required`,
      invalid_type_error: `The field '${label}' must be a list`,
    })
    .superRefine((values, ctx) => {
      if (new Set(values).size !== values.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `The list '${label}' contains duplicates` });
      }
    });
}

export const DrawCouplesRequestSchema = z
  .object({
    men: poolSchema('men'),
    women: poolSchema('women'),
  })
  .superRefine((pools, ctx) => {
    if (pools.men.length === 0 && pools.women.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one list must contain people' });
      return;
    }
    const men = new Set(pools.men);
    const shared = pools.women.filter((value) => men.has(value));
    if (shared.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Identifiers appear in both lists: ${shared.join(', ')}`,
      });
    }
  });

export type DrawCouplesRequest = z.infer<typeof DrawCouplesRequestSchema>;
