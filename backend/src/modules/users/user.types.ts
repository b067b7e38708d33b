/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain type for a stored login credential.
 *
 * RULES:
 * - passwordDigest is a self-describing hasher digest, never the plaintext.
 * - username is unique (enforced by the store) and immutable after creation.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 */

export type Credential = {
  readonly username: string;
  readonly passwordDigest: string;
  readonly createdAt: Date;
};
