import { describe, it, expect } from 'vitest';
import { APP_ERROR_CODES, AppError, isAppError } from '../../../src/shared/errors/errors';

describe('isAppError', () => {
  it('narrows AppError instances', () => {
    expect(isAppError(AppError.invalidInput())).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError('INVALID_INPUT')).toBe(false);
  });

  it('optionally matches a specific code', () => {
    const err = AppError.malformedDigest();
    expect(isAppError(err, 'MALFORMED_DIGEST')).toBe(true);
    expect(isAppError(err, 'INVALID_INPUT')).toBe(false);
  });
});

describe('AppError', () => {
  it('keeps code, message and meta', () => {
    const err = AppError.duplicateUsername('This username is already taken.', { source: 'storage' });
    expect(err.name).toBe('AppError');
    expect(err.code).toBe('DUPLICATE_USERNAME');
    expect(err.message).toBe('This username is already taken.');
    expect(err.meta).toEqual({ source: 'storage' });
    expect(err.cause).toBeUndefined();
  });
});

describe('APP_ERROR_CODES', () => {
  it('lists exactly the codes the kernel raises', () => {
    expect(APP_ERROR_CODES).toEqual([
      'INVALID_INPUT',
      'MALFORMED_DIGEST',
      'DUPLICATE_USERNAME',
      'STORAGE_UNAVAILABLE',
    ]);
  });
});
