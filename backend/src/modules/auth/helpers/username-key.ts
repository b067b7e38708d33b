/**
 * PII-safe log key for a username (same hasher as session keys).
 * Operational logs carry this instead of the raw username.
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';

export function usernameKey(tokenHasher: TokenHasher, username: string): string {
  return tokenHasher.hash(`username:${username}`).slice(0, 16);
}
