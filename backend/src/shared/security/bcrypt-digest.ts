/**
 * backend/src/shared/security/bcrypt-digest.ts
 *
 * Parses the modular-crypt form bcrypt emits:
 *
 *   $2b$12$<salt: 22 chars><hash: 31 chars>
 *
 * Both parts use bcrypt's base64 alphabet (./A-Za-z0-9).
 */

import { AppError } from '../errors/errors';

export const BCRYPT_MIN_COST = 4;
export const BCRYPT_MAX_COST = 31;

/** bcrypt only reads the first 72 bytes of its input. */
export const BCRYPT_MAX_INPUT_BYTES = 72;

const DIGEST_PATTERN = /^\$(2[aby])\$(\d{2})\$([./A-Za-z0-9]{22})([./A-Za-z0-9]{31})$/;

export type BcryptDigest = {
  algorithm: '2a' | '2b' | '2y';
  cost: number;
  salt: string;
  hash: string;
};

function toAlgorithm(raw: string): BcryptDigest['algorithm'] | null {
  if (raw === '2a' || raw === '2b' || raw === '2y') return raw;
  return null;
}

export function parseBcryptDigest(digest: string): BcryptDigest {
  const match = DIGEST_PATTERN.exec(digest);
  const algorithm = match ? toAlgorithm(match[1]) : null;
  if (!match || !algorithm) {
    throw AppError.malformedDigest('Password digest is not a bcrypt digest', {
      length: digest.length,
    });
  }

  const cost = Number(match[2]);
  if (cost < BCRYPT_MIN_COST || cost > BCRYPT_MAX_COST) {
    throw AppError.malformedDigest('Password digest cost is out of range', { cost });
  }

  return { algorithm, cost, salt: match[3], hash: match[4] };
}
