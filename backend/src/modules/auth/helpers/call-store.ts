/**
 * src/modules/auth/helpers/call-store.ts
 *
 * WHY:
 * - Collaborator I/O failures must reach callers as one fault: STORAGE_UNAVAILABLE.
 * - AppErrors raised by a store on purpose (DUPLICATE_USERNAME) pass through untouched.
 *
 * RULES:
 * - No retries here; retrying belongs to the storage layer.
 */

import { AppError, isAppError } from '../../../shared/errors/errors';
import type { Logger } from '../../../shared/logger/logger';

export async function callStore<T>(
  logger: Logger,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isAppError(err)) throw err;

    logger.error('auth.storage.unavailable', { flow: 'auth.storage', operation, err });
    throw AppError.storageUnavailable(err, { operation });
  }
}
