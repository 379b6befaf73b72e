/**
 * Error entrypoint: exports the error classes `load` resolves with, plus helpers for identifying and unwrapping them.
 * @module
 */

/** Union of the errors `load` resolves with. */
export type { ApiError, ApiErrorKind } from './apiError.js';
/** Error raised when a request is aborted. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a URL that could not be assembled. */
/** Extract an {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a body that does not decode into the expected shape. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error representing a transport failure or anything else unclassified. */
export { isUnknownError, UnknownError } from './unknownError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
