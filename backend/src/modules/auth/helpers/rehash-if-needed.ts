/**
 * src/modules/auth/helpers/rehash-if-needed.ts
 *
 * WHY:
 * - Raising BCRYPT_COST must not invalidate existing digests; they keep verifying at their
 *   own cost. The next successful login re-hashes at the current cost.
 *
 * RULES:
 * - Best-effort: the login already succeeded. A failed upgrade is logged (warn) and the
 *   old digest stays in place until the next login.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { Credential, UserStore } from '../../users';

export async function rehashIfNeeded(
  deps: { userStore: UserStore; passwordHasher: PasswordHasher; logger: Logger },
  params: { credential: Credential; password: string; usernameKey: string },
): Promise<boolean> {
  if (!deps.passwordHasher.needsRehash(params.credential.passwordDigest)) return false;

  try {
    const passwordDigest = await deps.passwordHasher.hash(params.password);
    const updated = await deps.userStore.updateDigest(params.credential.username, passwordDigest);

    deps.logger.info('auth.rehash.done', {
      flow: 'auth.rehash',
      usernameKey: params.usernameKey,
      updated,
    });
    return updated;
  } catch (err) {
    deps.logger.warn('auth.rehash.failed', {
      flow: 'auth.rehash',
      usernameKey: params.usernameKey,
      err,
    });
    return false;
  }
}
