/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Result types for the credential service.
 * - A rejected login and an invalid session are expected outcomes, so they are
 *   returned values (discriminated on `status`), not thrown errors.
 *
 * RULES:
 * - Never include plaintexts or digests in result types.
 * - `reason` is for internal logs/metrics only. Anything shown to an end user must use
 *   `message`, which is identical for every rejection reason (anti-enumeration).
 */

import type { SessionToken } from '../sessions/session.types';

export type AuthFailureReason = 'USER_NOT_FOUND' | 'BAD_PASSWORD';

export type AuthFailure = {
  status: 'REJECTED';
  reason: AuthFailureReason;
  message: string;
};

export type AuthenticateResult = { status: 'AUTHENTICATED'; session: SessionToken } | AuthFailure;

export type ChangePasswordResult = { status: 'CHANGED' } | AuthFailure;

/**
 * NOT_FOUND and EXPIRED must lead to the same caller behaviour (treat as logged out);
 * the distinction exists for UX copy and logs.
 */
export type SessionInvalidReason = 'NOT_FOUND' | 'EXPIRED';

export type SessionInvalid = {
  status: 'INVALID';
  reason: SessionInvalidReason;
};

export type SessionValidation =
  | { status: 'VALID'; username: string; session: SessionToken }
  | SessionInvalid;
