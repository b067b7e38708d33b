/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Raw session tokens are never used as storage keys.
 * - A dump of the session cache then holds no token that can be replayed.
 *
 * NOTE:
 * - Tokens carry >= 128 bits of entropy, so a fast unkeyed hash is enough.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
