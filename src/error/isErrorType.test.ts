import { describe, expect, it } from 'vitest';
import { ConstructURLError } from './constructUrlError.js';
import { DecodeError } from './decodeError.js';
import { isErrorType } from './isErrorType.js';
import { UnknownError } from './unknownError.js';

describe('isErrorType', () => {
  it('matches a direct instance', () => {
    expect(isErrorType(DecodeError, new DecodeError('error decoding', []))).toBe(true);
  });

  it('matches an instance nested as a cause', () => {
    const err = new UnknownError('error constructing URL in load', {
      cause: new ConstructURLError('invalid URL', 'not a url'),
    });

    expect(isErrorType(ConstructURLError, err)).toBe(true);
  });

  it('does not match unrelated errors', () => {
    expect(isErrorType(ConstructURLError, new UnknownError('boom'))).toBe(false);
    expect(isErrorType(ConstructURLError, undefined)).toBe(false);
  });
});
