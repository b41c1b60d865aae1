import { describe, expect, it } from 'vitest';

import { ConfigError, hasErrorCode, isNodeError, isNotFoundError, toErrorMessage } from '../src/utils/errors.js';

function errnoError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: failure`), { code });
}

describe('errors', () => {
  it('extracts messages from unknown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(toErrorMessage(42)).toBe('42');
  });

  it('recognizes errno errors', () => {
    expect(isNodeError(errnoError('ENOENT'))).toBe(true);
    expect(isNodeError(new Error('no code'))).toBe(false);
    expect(hasErrorCode(errnoError('EACCES'), 'EACCES')).toBe(true);
    expect(isNotFoundError(errnoError('ENOENT'))).toBe(true);
    expect(isNotFoundError(errnoError('EACCES'))).toBe(false);
  });

  it('names ConfigError and keeps the cause', () => {
    const cause = new SyntaxError('Unexpected end of JSON input');
    const error = new ConfigError('bad config', { cause });

    expect(error.name).toBe('ConfigError');
    expect(error.message).toBe('bad config');
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
  });
});
