/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - The credential kernel's public operations: register, authenticate, validateSession,
 *   logout, plus changePassword and logoutAll.
 * - Callers (routing layer, jobs) own transport: cookies, headers, redirects.
 *
 * RULES:
 * - Stateless per call: all mutable state lives in the injected stores. One instance is
 *   safe to share across concurrent requests.
 * - The only memoized value is the dummy digest for unknown-user comparisons. It is built
 *   from random bytes, never from caller input.
 * - Never store/log raw passwords, digests or tokens.
 *
 * STRUCTURE:
 * - register / authenticate / changePassword: delegate to flows/ (multi-step orchestration).
 * - validateSession / logout / logoutAll: small enough to live here.
 */

import type { Clock } from '../../shared/clock/clock';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { generateSecureToken } from '../../shared/security/token';
import type { Credential, UserStore } from '../users';
import type { SessionStore } from '../sessions';

import { parseInput, usernameSchema } from './auth.schemas';
import type {
  AuthenticateResult,
  ChangePasswordResult,
  SessionInvalid,
  SessionValidation,
} from './auth.types';
import { callStore } from './helpers/call-store';
import { isSessionExpired } from './policies/session-expiry.policy';
import { executeRegisterFlow } from './flows/register/execute-register-flow';
import { executeAuthenticateFlow } from './flows/authenticate/execute-authenticate-flow';
import { executeChangePasswordFlow } from './flows/change-password/execute-change-password-flow';

export type CredentialServiceDeps = {
  userStore: UserStore;
  sessionStore: SessionStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  clock: Clock;
  logger: Logger;

  sessionTtlSeconds: number;
  sessionTokenBytes: number;
};

const NOT_FOUND: SessionInvalid = { status: 'INVALID', reason: 'NOT_FOUND' };
const EXPIRED: SessionInvalid = { status: 'INVALID', reason: 'EXPIRED' };

export class CredentialService {
  private dummyDigestPromise: Promise<string> | null = null;

  constructor(private readonly deps: CredentialServiceDeps) {}

  /**
   * Digest of a random secret at the hasher's current cost. Built once; a failed build is
   * not cached so the next call retries.
   */
  private readonly dummyDigest = (): Promise<string> => {
    if (!this.dummyDigestPromise) {
      this.dummyDigestPromise = this.deps.passwordHasher
        .hash(generateSecureToken(16))
        .catch((err: unknown) => {
          this.dummyDigestPromise = null;
          throw err;
        });
    }
    return this.dummyDigestPromise;
  };

  /**
   * Builds the dummy digest ahead of the first unknown-user login, so that login is not
   * slower than the rest. createAuthModule() awaits it; callers constructing the service
   * directly must await it themselves before serving logins.
   */
  async prepare(): Promise<void> {
    await this.dummyDigest();
  }

  async register(username: string, password: string): Promise<Credential> {
    return executeRegisterFlow(this.deps, { username, password });
  }

  async authenticate(username: string, password: string): Promise<AuthenticateResult> {
    return executeAuthenticateFlow(
      { ...this.deps, dummyDigest: this.dummyDigest },
      { username, password },
    );
  }

  async changePassword(
    username: string,
    currentPassword: string,
    newPassword: string,
  ): Promise<ChangePasswordResult> {
    return executeChangePasswordFlow(
      { ...this.deps, dummyDigest: this.dummyDigest },
      { username, currentPassword, newPassword },
    );
  }

  /**
   * Resolves a presented token to its username. An expired record is deleted here, so the
   * next call with the same token reports NOT_FOUND.
   */
  async validateSession(tokenId: string): Promise<SessionValidation> {
    if (typeof tokenId !== 'string' || tokenId.length === 0) return NOT_FOUND;

    const session = await callStore(this.deps.logger, 'sessions.get', () =>
      this.deps.sessionStore.get(tokenId),
    );
    if (!session) return NOT_FOUND;

    if (isSessionExpired(session, this.deps.clock.now())) {
      await callStore(this.deps.logger, 'sessions.delete', () =>
        this.deps.sessionStore.delete(tokenId),
      );
      this.deps.logger.info('auth.session.expired', {
        flow: 'auth.session',
        expiresAt: session.expiresAt.toISOString(),
      });
      return EXPIRED;
    }

    return { status: 'VALID', username: session.username, session };
  }

  /** Idempotent: an unknown or already-deleted token is not an error. */
  async logout(tokenId: string): Promise<void> {
    if (typeof tokenId !== 'string' || tokenId.length === 0) return;

    await callStore(this.deps.logger, 'sessions.delete', () =>
      this.deps.sessionStore.delete(tokenId),
    );
  }

  /** Ends every session of the user (e.g. "sign out everywhere"). Idempotent. */
  async logoutAll(username: string): Promise<void> {
    const name = parseInput(usernameSchema, username);

    await callStore(this.deps.logger, 'sessions.deleteAllForUser', () =>
      this.deps.sessionStore.deleteAllForUser(name),
    );
  }
}
