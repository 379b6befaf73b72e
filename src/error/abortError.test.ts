import { describe, expect, it } from 'vitest';
import { AbortError, isAbortError } from './abortError.js';
import { UnknownError } from './unknownError.js';

describe('isAbortError', () => {
  it('returns true for instances of AbortError', () => {
    const err = new AbortError('stopped');

    expect(isAbortError(err)).toBe(true);
    expect(err.name).toBe('AbortError');
  });

  it('returns true for an AbortError nested as a cause', () => {
    expect(isAbortError(new UnknownError('error requesting', { cause: new AbortError('stopped') }))).toBe(true);
  });

  it('returns false for non-abort errors', () => {
    expect(isAbortError(new Error('boom'))).toBe(false);
  });
});
