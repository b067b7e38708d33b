/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes input validation for the credential service.
 * - Prevents invalid input from reaching the hasher or the stores.
 *
 * RULES:
 * - Use Zod for runtime validation; failures become INVALID_INPUT.
 * - Usernames are taken as given (no trimming/case folding): they are immutable identifiers.
 * - Password length limits beyond "non-empty" are the hasher's job.
 */

import { z } from 'zod';
import { AuthErrors } from './auth.errors';

export const USERNAME_MAX_LENGTH = 64;

export const usernameSchema = z
  .string({ required_error: 'Username is required' })
  .min(1, 'Username is required')
  .max(USERNAME_MAX_LENGTH, `Username must be at most ${USERNAME_MAX_LENGTH} characters`)
  .refine((v) => v.trim().length > 0, 'Username must not be blank');

const passwordSchema = z
  .string({ required_error: 'Password is required' })
  .min(1, 'Password is required');

// Lookups only need a name to look up: a name that could never be registered is simply
// not found, so the username rules above apply to registration alone.
const lookupUsernameSchema = z
  .string({ required_error: 'Username is required' })
  .min(1, 'Username is required');

export const credentialsSchema = z.object({
  username: usernameSchema,
  password: passwordSchema,
});

export const loginSchema = z.object({
  username: lookupUsernameSchema,
  password: passwordSchema,
});

export const changePasswordSchema = z.object({
  username: lookupUsernameSchema,
  currentPassword: passwordSchema,
  newPassword: passwordSchema,
});

/**
 * Parses `input` or throws INVALID_INPUT naming the offending fields.
 */
export function parseInput<T>(schema: z.ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const first = parsed.error.issues[0];
  throw AuthErrors.invalidInput(first?.message ?? 'Invalid input', {
    fields: [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))],
  });
}
