/**
 * src/modules/auth/helpers/mint-session-token.ts
 *
 * Builds the SessionToken value for a successful login. Persisting it is the caller's job.
 */

import { generateSecureToken } from '../../../shared/security/token';
import type { SessionToken } from '../../sessions/session.types';

export type MintSessionTokenParams = {
  username: string;
  now: Date;
  ttlSeconds: number;
  tokenBytes: number;
};

export function mintSessionToken(params: MintSessionTokenParams): SessionToken {
  return {
    tokenId: generateSecureToken(params.tokenBytes),
    username: params.username,
    issuedAt: params.now,
    expiresAt: new Date(params.now.getTime() + params.ttlSeconds * 1000),
  };
}
