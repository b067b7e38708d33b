/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: rejection messages never reveal whether a username exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or digests in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';
import type { AuthFailure, AuthFailureReason } from './auth.types';

/** Single caller-visible message for every failed credential check. */
export const INVALID_CREDENTIALS_MESSAGE = 'Invalid username or password.';

export const AuthErrors = {
  /** Registration: username already present (pre-check or storage constraint). */
  usernameTaken(meta?: AppErrorMeta) {
    return AppError.duplicateUsername('This username is already taken.', meta);
  },

  /** Input failed schema validation. The first issue becomes the message. */
  invalidInput(message: string, meta?: AppErrorMeta) {
    return AppError.invalidInput(message, meta);
  },

  /** Expected outcome, returned (not thrown) by authenticate/changePassword. */
  rejected(reason: AuthFailureReason): AuthFailure {
    return { status: 'REJECTED', reason, message: INVALID_CREDENTIALS_MESSAGE };
  },
} as const;
