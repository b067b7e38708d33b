/**
 * backend/src/modules/auth/index.ts
 *
 * Public surface of the auth module.
 */

export { CredentialService, type CredentialServiceDeps } from './auth.service';
export { createAuthModule, type AuthModule } from './auth.module';
export { INVALID_CREDENTIALS_MESSAGE } from './auth.errors';
export { USERNAME_MAX_LENGTH } from './auth.schemas';
export type {
  AuthFailure,
  AuthFailureReason,
  AuthenticateResult,
  ChangePasswordResult,
  SessionInvalid,
  SessionInvalidReason,
  SessionValidation,
} from './auth.types';
