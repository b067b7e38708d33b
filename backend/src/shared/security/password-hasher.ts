/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const digest = await hasher.hash(password)
 * - const ok = await hasher.verify(password, digest)
 * - if (hasher.needsRehash(digest)) -> hash again and persist the new digest
 *
 * CONTRACT:
 * - Digests are self-describing (algorithm, cost, salt, output in one string).
 * - hash() rejects empty input with INVALID_INPUT.
 * - verify() throws MALFORMED_DIGEST for an unparseable digest; it never reports
 *   a corrupted digest as a plain mismatch.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, digest: string): Promise<boolean>;
  needsRehash(digest: string): boolean;
}
