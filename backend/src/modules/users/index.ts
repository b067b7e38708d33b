/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module. Other modules import from here, not from /dal.
 */

export type { Credential } from './user.types';
export type { UserStore } from './user-store';
export { KyselyUserStore, isUniqueViolation } from './dal/kysely-user-store';
export { InMemUserStore } from './dal/inmem-user-store';
