/**
 * backend/src/shared/errors/errors.ts
 *
 * WHY:
 * - Central error primitive thrown by the kernel and its adapters.
 * - Callers (a routing layer, a CLI) branch on `code`, never on message text.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 * - Expected outcomes (rejected login, invalid session) are returned values, not AppErrors.
 */

export const APP_ERROR_CODES = [
  'INVALID_INPUT',
  'MALFORMED_DIGEST',
  'DUPLICATE_USERNAME',
  'STORAGE_UNAVAILABLE',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static invalidInput(message = 'Invalid input', meta?: AppErrorMeta) {
    return new AppError({ code: 'INVALID_INPUT', message, meta });
  }

  static malformedDigest(message = 'Malformed password digest', meta?: AppErrorMeta) {
    return new AppError({ code: 'MALFORMED_DIGEST', message, meta });
  }

  static duplicateUsername(message = 'Username already taken', meta?: AppErrorMeta) {
    return new AppError({ code: 'DUPLICATE_USERNAME', message, meta });
  }

  static storageUnavailable(cause: unknown, meta?: AppErrorMeta) {
    return new AppError({
      code: 'STORAGE_UNAVAILABLE',
      message: 'Storage unavailable',
      meta,
      cause,
    });
  }
}

export function isAppError(err: unknown, code?: AppErrorCode): err is AppError {
  if (!(err instanceof AppError)) return false;
  return code === undefined || err.code === code;
}
