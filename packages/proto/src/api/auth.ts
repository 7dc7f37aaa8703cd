import { z } from 'zod';

export const EmailSchema = z
  .string()
  .trim()
  .min(1, 'Email is required')
  .max(254, 'Email must be at most 254 characters')
  .email('Email must be a valid address');

export const PasswordSchema = z
  .string()
  .min(1, 'Password is required')
  .max(128, 'Password must be at most 128 characters');

export const RegisterRequestSchema = z.object({
  email: EmailSchema,
  password: PasswordSchema,
});

/** OAuth2 password-grant shape; `username` carries the email. */
export const TokenRequestSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: PasswordSchema,
});

export const TokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.literal('bearer'),
});

export const UserResponseSchema = z.object({
  id: z.number().int(),
  email: z.string(),
  created_at: z.string().datetime(),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type TokenRequest = z.infer<typeof TokenRequestSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type UserResponse = z.infer<typeof UserResponseSchema>;
