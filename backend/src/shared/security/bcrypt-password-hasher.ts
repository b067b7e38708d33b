/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a battle-tested password hashing algorithm.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const digest = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', digest)
 *
 * RULES:
 * - verify() uses the cost + salt stored in the digest, never this.cost.
 *   Raising the configured cost keeps old digests valid; needsRehash() flags them.
 * - Comparison is bcrypt.compare (constant-time); do NOT compare digests with ===.
 * - bcrypt truncates input at 72 bytes, so a longer plaintext never matches: hash() refuses
 *   it and verify() answers false after doing the same compare work.
 * - $2y$ is the same algorithm as $2b$; the native binding only answers for $2a$/$2b$.
 */

import bcrypt from 'bcrypt';
import { AppError } from '../errors/errors';
import type { PasswordHasher } from './password-hasher';
import {
  BCRYPT_MAX_COST,
  BCRYPT_MAX_INPUT_BYTES,
  BCRYPT_MIN_COST,
  parseBcryptDigest,
} from './bcrypt-digest';

export const DEFAULT_BCRYPT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  readonly cost: number;

  constructor(opts?: { cost?: number }) {
    const cost = opts?.cost ?? DEFAULT_BCRYPT_COST;
    if (!Number.isInteger(cost) || cost < BCRYPT_MIN_COST || cost > BCRYPT_MAX_COST) {
      throw AppError.invalidInput(
        `bcrypt cost must be an integer between ${BCRYPT_MIN_COST} and ${BCRYPT_MAX_COST}`,
        { cost },
      );
    }
    this.cost = cost;
  }

  async hash(plain: string): Promise<string> {
    if (plain.length === 0) {
      throw AppError.invalidInput('Password must not be empty');
    }
    if (Buffer.byteLength(plain, 'utf8') > BCRYPT_MAX_INPUT_BYTES) {
      throw AppError.invalidInput(`Password must be at most ${BCRYPT_MAX_INPUT_BYTES} bytes`);
    }
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, digest: string): Promise<boolean> {
    // Throws MALFORMED_DIGEST before bcrypt gets a chance to answer "false".
    const parsed = parseBcryptDigest(digest);
    const comparable = parsed.algorithm === '2y' ? `$2b$${digest.slice(4)}` : digest;

    const matches = await bcrypt.compare(plain, comparable);
    if (Buffer.byteLength(plain, 'utf8') > BCRYPT_MAX_INPUT_BYTES) return false;
    return matches;
  }

  needsRehash(digest: string): boolean {
    return parseBcryptDigest(digest).cost < this.cost;
  }
}
