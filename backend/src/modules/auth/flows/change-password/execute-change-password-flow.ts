/**
 * backend/src/modules/auth/flows/change-password/execute-change-password-flow.ts
 *
 * WHY:
 * - The only path that replaces a stored digest on purpose.
 * - Proves knowledge of the current password with the same check as login.
 * - Ends every session of the user: whoever held the old password must not keep access.
 *
 * RULES:
 * - No auto-login afterwards; the caller authenticates with the new password.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { UserStore } from '../../../users';
import type { SessionStore } from '../../../sessions';

import { AuthErrors } from '../../auth.errors';
import { changePasswordSchema, parseInput } from '../../auth.schemas';
import type { ChangePasswordResult } from '../../auth.types';
import { callStore } from '../../helpers/call-store';
import { checkCredential } from '../../helpers/check-credential';
import { usernameKey } from '../../helpers/username-key';

const FLOW = 'auth.change_password';

export type ChangePasswordParams = {
  username: string;
  currentPassword: string;
  newPassword: string;
};

export async function executeChangePasswordFlow(
  deps: {
    userStore: UserStore;
    sessionStore: SessionStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    logger: Logger;
    dummyDigest: () => Promise<string>;
  },
  params: ChangePasswordParams,
): Promise<ChangePasswordResult> {
  const input = parseInput(changePasswordSchema, params);
  const key = usernameKey(deps.tokenHasher, input.username);

  const check = await checkCredential(deps, {
    username: input.username,
    password: input.currentPassword,
    flow: FLOW,
  });

  if (check.status === 'REJECTED') {
    deps.logger.info('auth.change_password.rejected', {
      flow: FLOW,
      usernameKey: key,
      reason: check.reason,
    });
    return check;
  }

  const passwordDigest = await deps.passwordHasher.hash(input.newPassword);

  const updated = await callStore(deps.logger, 'users.updateDigest', () =>
    deps.userStore.updateDigest(input.username, passwordDigest),
  );
  if (!updated) {
    // Deleted between the check and the write.
    return AuthErrors.rejected('USER_NOT_FOUND');
  }

  await callStore(deps.logger, 'sessions.deleteAllForUser', () =>
    deps.sessionStore.deleteAllForUser(input.username),
  );

  deps.logger.info('auth.change_password.success', { flow: FLOW, usernameKey: key });

  return { status: 'CHANGED' };
}
