/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Session token ids must be unguessable and unique across active sessions.
 * - 32 random bytes (256 bits) by default; callers may not go below 16 bytes (128 bits).
 *
 * HOW TO USE:
 * - const tokenId = generateSecureToken(config.sessionTokenBytes)
 * - Hand the raw token to the caller; stores key sessions by its hash.
 */

import { randomBytes } from 'node:crypto';
import { AppError } from '../errors/errors';

export const MIN_TOKEN_BYTES = 16;

export function generateSecureToken(bytes: number = 32): string {
  if (!Number.isInteger(bytes) || bytes < MIN_TOKEN_BYTES) {
    throw AppError.invalidInput(`Token size must be at least ${MIN_TOKEN_BYTES} bytes`, { bytes });
  }
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
