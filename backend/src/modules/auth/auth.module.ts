/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 * - Resolves only once the service is ready: the unknown-user dummy digest is built
 *   before the first login can arrive.
 */

import { CredentialService, type CredentialServiceDeps } from './auth.service';

export type AuthModule = Awaited<ReturnType<typeof createAuthModule>>;

export async function createAuthModule(deps: CredentialServiceDeps) {
  const credentialService = new CredentialService(deps);
  await credentialService.prepare();

  return {
    credentialService,
  };
}
