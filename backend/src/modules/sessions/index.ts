/**
 * backend/src/modules/sessions/index.ts
 *
 * Public surface of the sessions module.
 */

export type { SessionToken } from './session.types';
export type { SessionStore } from './session-store';
export { CacheSessionStore } from './cache-session-store';
