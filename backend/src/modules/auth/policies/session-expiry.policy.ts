/**
 * WHY:
 * - Session expiry is a pure rule; keep it unit-testable without a store.
 *
 * RULE:
 * - A session is expired once now >= expiresAt (the boundary instant is already expired).
 */

import type { SessionToken } from '../../sessions/session.types';

export function isSessionExpired(session: Pick<SessionToken, 'expiresAt'>, now: Date): boolean {
  return session.expiresAt.getTime() <= now.getTime();
}
