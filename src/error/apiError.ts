import type { DecodeError } from './decodeError.js';
import type { HTTPError } from './httpError.js';
import type { UnknownError } from './unknownError.js';

/**
 * Every error `Webservice.load` can resolve with, discriminated by `kind`.
 */
export type ApiError = DecodeError | HTTPError | UnknownError;

/** Discriminant values of {@link ApiError}. */
export type ApiErrorKind = ApiError['kind'];
