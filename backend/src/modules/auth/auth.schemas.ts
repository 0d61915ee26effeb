/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email normalized to lowercase in the login flow, not here.
 * - Token fields are only checked for presence. Verification is SessionService's job.
 */

import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token is required'),
});

export type RefreshInput = z.infer<typeof refreshSchema>;

export const logoutSchema = z
  .object({
    refreshToken: z.string().min(1).optional(),
  })
  .optional();

export type LogoutInput = z.infer<typeof logoutSchema>;
