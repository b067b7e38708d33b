/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Concrete TokenHasher: hex SHA-256.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
