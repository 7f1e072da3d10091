import { z } from 'zod';

const USERNAME_REGEX = /^[a-z0-9._-]+$/;

export const UsernameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(3, 'Username must be at least 3 characters')
  .max(80, 'Username must be at most 80 characters')
  .regex(USERNAME_REGEX, 'Username may only contain a-z, 0-9, dots, underscores, and hyphens');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(128, 'Password must be at most 128 characters');

export const RegisterRequestSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema,
});

export const LoginRequestSchema = z.object({
  username: UsernameSchema,
  password: z.string().min(1, 'Password is required'),
});

export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

export const LogoutRequestSchema = z.object({
  token: z.string().min(1).optional(),
  refreshToken: z.string().min(1).optional(),
});

export const AdminProfileSchema = z.object({
  id: z.string(),
  username: z.string(),
  createdAt: z.string().datetime(),
});

export const LoginResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  admin: AdminProfileSchema,
});

export const RefreshResponseSchema = z.object({
  accessToken: z.string(),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type LogoutRequest = z.infer<typeof LogoutRequestSchema>;
export type LoginResponse = z.infer<typeof LoginResponseSchema>;
export type RefreshResponse = z.infer<typeof RefreshResponseSchema>;
