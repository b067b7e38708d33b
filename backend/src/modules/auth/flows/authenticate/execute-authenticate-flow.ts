/**
 * backend/src/modules/auth/flows/authenticate/execute-authenticate-flow.ts
 *
 * WHY:
 * - One login attempt, end to end:
 *   START -> LOOKUP_USER -> {[USER_NOT_FOUND] | VERIFY_PASSWORD -> {[REJECTED] | ISSUE_SESSION -> [AUTHENTICATED]}}
 *
 * RULES:
 * - Both rejection reasons return the same caller-visible message and cost one bcrypt compare.
 * - The reason is logged (with a username key, not the username) for operators only.
 * - A digest below the configured cost is upgraded after a successful compare.
 */

import type { Clock } from '../../../../shared/clock/clock';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { UserStore } from '../../../users';
import type { SessionStore } from '../../../sessions';

import { loginSchema, parseInput } from '../../auth.schemas';
import type { AuthenticateResult } from '../../auth.types';
import { callStore } from '../../helpers/call-store';
import { checkCredential } from '../../helpers/check-credential';
import { mintSessionToken } from '../../helpers/mint-session-token';
import { rehashIfNeeded } from '../../helpers/rehash-if-needed';
import { usernameKey } from '../../helpers/username-key';

const FLOW = 'auth.authenticate';

export type AuthenticateParams = {
  username: string;
  password: string;
};

export async function executeAuthenticateFlow(
  deps: {
    userStore: UserStore;
    sessionStore: SessionStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    clock: Clock;
    logger: Logger;
    dummyDigest: () => Promise<string>;
    sessionTtlSeconds: number;
    sessionTokenBytes: number;
  },
  params: AuthenticateParams,
): Promise<AuthenticateResult> {
  const input = parseInput(loginSchema, params);
  const key = usernameKey(deps.tokenHasher, input.username);

  deps.logger.info('auth.authenticate.start', { flow: FLOW, usernameKey: key });

  const check = await checkCredential(deps, {
    username: input.username,
    password: input.password,
    flow: FLOW,
  });

  if (check.status === 'REJECTED') {
    deps.logger.info('auth.authenticate.rejected', {
      flow: FLOW,
      usernameKey: key,
      reason: check.reason,
    });
    return check;
  }

  await rehashIfNeeded(deps, {
    credential: check.credential,
    password: input.password,
    usernameKey: key,
  });

  const session = mintSessionToken({
    username: check.credential.username,
    now: deps.clock.now(),
    ttlSeconds: deps.sessionTtlSeconds,
    tokenBytes: deps.sessionTokenBytes,
  });

  await callStore(deps.logger, 'sessions.put', () => deps.sessionStore.put(session));

  deps.logger.info('auth.authenticate.success', {
    flow: FLOW,
    usernameKey: key,
    expiresAt: session.expiresAt.toISOString(),
  });

  return { status: 'AUTHENTICATED', session };
}
