import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

export const JwtConfigSchema = z
  .object({
    JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
    JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
    JWT_ISSUER: z.string().min(1).default('giftpair'),
    JWT_ACCESS_TOKEN_TTL: z.coerce.number().int().positive().default(3600),
    JWT_REFRESH_TOKEN_TTL: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  })
  .refine((jwt) => jwt.JWT_REFRESH_TOKEN_TTL > jwt.JWT_ACCESS_TOKEN_TTL, {
    message: 'JWT_REFRESH_TOKEN_TTL must be longer than JWT_ACCESS_TOKEN_TTL',
    path: ['JWT_REFRESH_TOKEN_TTL'],
  });

export type JwtConfig = z.infer<typeof JwtConfigSchema>;

export const PasswordHashConfigSchema = z.object({
  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(19456),
  ARGON2_TIME_COST: z.coerce.number().int().min(1).default(2),
});

export type PasswordHashConfig = z.infer<typeof PasswordHashConfigSchema>;

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(PasswordHashConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    ADMIN_REGISTRATION_ENABLED: booleanFlag,
    PAIRING_SEED: z.coerce.number().int().optional(),
  })
  .and(JwtConfigSchema);

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const AdminCliConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).merge(PasswordHashConfigSchema).extend({
  ADMIN_USERNAME: z.string().trim().min(3).optional(),
  ADMIN_PASSWORD: z.string().min(8).optional(),
});

export type AdminCliConfig = z.infer<typeof AdminCliConfigSchema>;

export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
