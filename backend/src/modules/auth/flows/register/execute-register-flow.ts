/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - One end-to-end use-case: validate -> uniqueness pre-check -> hash -> insert.
 *
 * RULES:
 * - The pre-check is a fast path only. Two concurrent registrations can both pass it;
 *   the store's unique constraint decides, and its DUPLICATE_USERNAME is reported the same way.
 * - The returned Credential carries the digest, never the plaintext.
 */

import { isAppError } from '../../../../shared/errors/errors';
import type { Clock } from '../../../../shared/clock/clock';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { Credential, UserStore } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { credentialsSchema, parseInput } from '../../auth.schemas';
import { callStore } from '../../helpers/call-store';
import { usernameKey } from '../../helpers/username-key';

export type RegisterParams = {
  username: string;
  password: string;
};

export async function executeRegisterFlow(
  deps: {
    userStore: UserStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    clock: Clock;
    logger: Logger;
  },
  params: RegisterParams,
): Promise<Credential> {
  const input = parseInput(credentialsSchema, params);
  const key = usernameKey(deps.tokenHasher, input.username);

  deps.logger.info('auth.register.start', { flow: 'auth.register', usernameKey: key });

  const existing = await callStore(deps.logger, 'users.findByUsername', () =>
    deps.userStore.findByUsername(input.username),
  );
  if (existing) {
    deps.logger.info('auth.register.duplicate', { flow: 'auth.register', usernameKey: key });
    throw AuthErrors.usernameTaken();
  }

  const credential: Credential = {
    username: input.username,
    passwordDigest: await deps.passwordHasher.hash(input.password),
    createdAt: deps.clock.now(),
  };

  try {
    await callStore(deps.logger, 'users.insert', () => deps.userStore.insert(credential));
  } catch (err) {
    if (isAppError(err, 'DUPLICATE_USERNAME')) {
      deps.logger.info('auth.register.duplicate', {
        flow: 'auth.register',
        usernameKey: key,
        source: 'storage',
      });
      throw AuthErrors.usernameTaken({ source: 'storage' });
    }
    throw err;
  }

  deps.logger.info('auth.register.success', { flow: 'auth.register', usernameKey: key });

  return credential;
}
