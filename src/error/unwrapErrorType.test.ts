import { describe, expect, it } from 'vitest';
import { DecodeError } from './decodeError.js';
import { HTTPError } from './httpError.js';
import { UnknownError } from './unknownError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(DecodeError, { message: 'not an error' })).toBeNull();
    expect(unwrapErrorType(DecodeError, 'decode failed')).toBeNull();
    expect(unwrapErrorType(DecodeError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new DecodeError('error decoding', []);

    expect(unwrapErrorType(DecodeError, err)).toBe(err);
  });

  it('follows the cause chain', () => {
    const inner = new HTTPError(new Response(null, { status: 502 }));
    const outer = new Error('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(HTTPError, outer)).toBe(inner);
  });

  it('returns the outermost match when several links match', () => {
    const inner = new UnknownError('inner');
    const outer = new UnknownError('outer', { cause: inner });

    expect(unwrapErrorType(UnknownError, outer)).toBe(outer);
  });

  it('stops at a non-error cause', () => {
    const err = new Error('outer', { cause: 'a plain string' });

    expect(unwrapErrorType(UnknownError, err)).toBeNull();
  });

  it('returns null when nothing in the chain matches', () => {
    const err = new UnknownError('outer', { cause: new Error('inner') });

    expect(unwrapErrorType(DecodeError, err)).toBeNull();
  });
});
