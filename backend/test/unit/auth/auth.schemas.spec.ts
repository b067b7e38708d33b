import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/errors/errors';
import {
  credentialsSchema,
  loginSchema,
  parseInput,
  usernameSchema,
} from '../../../src/modules/auth/auth.schemas';

function errorOf(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected INVALID_INPUT');
}

describe('parseInput', () => {
  it('returns the input untouched when valid', () => {
    expect(parseInput(credentialsSchema, { username: ' alice', password: 'x' })).toEqual({
      username: ' alice',
      password: 'x',
    });
  });

  it('reports an empty username as INVALID_INPUT', () => {
    const err = errorOf(() => parseInput(credentialsSchema, { username: '', password: 'x' }));
    expect(err.code).toBe('INVALID_INPUT');
    expect(err.message).toBe('Username is required');
    expect(err.meta).toEqual({ fields: ['username'] });
  });

  it('reports a blank username', () => {
    const err = errorOf(() => parseInput(usernameSchema, '   '));
    expect(err.message).toBe('Username must not be blank');
  });

  it('caps usernames at 64 characters', () => {
    expect(parseInput(usernameSchema, 'a'.repeat(64))).toBe('a'.repeat(64));
    const err = errorOf(() => parseInput(usernameSchema, 'a'.repeat(65)));
    expect(err.message).toBe('Username must be at most 64 characters');
  });

  it('lists every failing field', () => {
    const err = errorOf(() => parseInput(credentialsSchema, { username: '', password: '' }));
    expect(err.meta).toEqual({ fields: ['username', 'password'] });
  });

  it('rejects non-string input from untyped callers', () => {
    const err = errorOf(() => parseInput(credentialsSchema, { username: 42, password: 'x' }));
    expect(err.code).toBe('INVALID_INPUT');
    expect(err.meta).toEqual({ fields: ['username'] });
  });

  it('lets lookups through with names registration would refuse', () => {
    expect(parseInput(loginSchema, { username: '   ', password: 'x' })).toEqual({
      username: '   ',
      password: 'x',
    });
    expect(parseInput(loginSchema, { username: 'a'.repeat(65), password: 'x' }).username).toBe(
      'a'.repeat(65),
    );
  });

  it('still requires a non-empty lookup username', () => {
    const err = errorOf(() => parseInput(loginSchema, { username: '', password: 'x' }));
    expect(err.message).toBe('Username is required');
    expect(err.meta).toEqual({ fields: ['username'] });
  });
});
