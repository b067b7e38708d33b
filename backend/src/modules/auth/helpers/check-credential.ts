/**
 * src/modules/auth/helpers/check-credential.ts
 *
 * WHY:
 * - authenticate() and changePassword() share the same credential check:
 *   LOOKUP_USER -> {USER_NOT_FOUND | VERIFY_PASSWORD -> {BAD_PASSWORD | VERIFIED}}.
 *
 * RULES:
 * - The unknown-user path still runs one bcrypt comparison (against a dummy digest of the
 *   configured cost) so both rejection paths cost the same.
 * - A corrupted stored digest is logged and rethrown (MALFORMED_DIGEST), never reported as
 *   a wrong password.
 */

import { isAppError } from '../../../shared/errors/errors';
import type { Logger } from '../../../shared/logger/logger';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { Credential, UserStore } from '../../users';
import { AuthErrors } from '../auth.errors';
import type { AuthFailure } from '../auth.types';
import { callStore } from './call-store';

export type CredentialCheck = { status: 'VERIFIED'; credential: Credential } | AuthFailure;

export async function checkCredential(
  deps: {
    userStore: UserStore;
    passwordHasher: PasswordHasher;
    logger: Logger;
    dummyDigest: () => Promise<string>;
  },
  params: { username: string; password: string; flow: string },
): Promise<CredentialCheck> {
  const credential = await callStore(deps.logger, 'users.findByUsername', () =>
    deps.userStore.findByUsername(params.username),
  );

  if (!credential) {
    await deps.passwordHasher.verify(params.password, await deps.dummyDigest());
    return AuthErrors.rejected('USER_NOT_FOUND');
  }

  let valid: boolean;
  try {
    valid = await deps.passwordHasher.verify(params.password, credential.passwordDigest);
  } catch (err) {
    if (isAppError(err, 'MALFORMED_DIGEST')) {
      deps.logger.error('auth.credential.malformed_digest', { flow: params.flow, err });
    }
    throw err;
  }

  if (!valid) return AuthErrors.rejected('BAD_PASSWORD');

  return { status: 'VERIFIED', credential };
}
