/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the kernel.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: tests build the same graph from in-memory stores.
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { systemClock } from '../shared/clock/clock';
import type { Clock } from '../shared/clock/clock';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { KyselyUserStore } from '../modules/users';
import type { UserStore } from '../modules/users';
import { CacheSessionStore } from '../modules/sessions';
import type { SessionStore } from '../modules/sessions';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;
  clock: Clock;

  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  userStore: UserStore;
  sessionStore: SessionStore;

  // modules
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  // Validated config wins over the raw env the logger was created from.
  logger.level = config.logLevel;
  logger.defaultMeta = { service: config.serviceName, env: config.nodeEnv };

  const db = createDb(config.databaseUrl);

  // Redis is mandatory (sessions must be shared by every process)
  const redis = await RedisCache.connect(config.redisUrl, logger);

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  const userStore = new KyselyUserStore(db);
  const sessionStore = new CacheSessionStore({ cache: redis, tokenHasher, logger });

  const auth = await createAuthModule({
    userStore,
    sessionStore,
    passwordHasher,
    tokenHasher,
    clock: systemClock,
    logger,
    sessionTtlSeconds: config.sessionTtlSeconds,
    sessionTokenBytes: config.sessionTokenBytes,
  });

  logger.info('kernel.ready', {
    env: config.nodeEnv,
    bcryptCost: config.bcryptCost,
    sessionTtlSeconds: config.sessionTtlSeconds,
  });

  return {
    db,
    cache: redis,
    logger,
    clock: systemClock,
    tokenHasher,
    passwordHasher,
    userStore,
    sessionStore,
    auth,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}
