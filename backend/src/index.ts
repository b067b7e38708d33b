/**
 * backend/src/index.ts
 *
 * WHY:
 * - Package entrypoint. The kernel has no server of its own: callers either use
 *   buildDeps(buildConfig()) for the Postgres + Redis wiring, or compose
 *   CredentialService from their own stores.
 */

export { buildConfig, type AppConfig } from './app/config';
export { buildDeps, type AppDeps } from './app/di';

export { AppError, isAppError, type AppErrorCode } from './shared/errors/errors';
export { systemClock, FixedClock, type Clock } from './shared/clock/clock';
export { logger, type Logger } from './shared/logger/logger';

export type { PasswordHasher } from './shared/security/password-hasher';
export { BcryptPasswordHasher } from './shared/security/bcrypt-password-hasher';
export type { TokenHasher } from './shared/security/token-hasher';
export { Sha256TokenHasher } from './shared/security/sha256-token-hasher';

export type { Cache } from './shared/cache/cache';
export { InMemCache } from './shared/cache/inmem-cache';
export { RedisCache } from './shared/cache/redis-cache';

export * from './modules/users';
export * from './modules/sessions';
export * from './modules/auth';
