/**
 * Root entrypoint: re-exports the Webservice client, request types, error classes and the secrets reader.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Typed JSON loader over GET.
 */
export { Webservice } from './core/client.js';

/**
 * Constructor, config and per-call option types accepted by {@link Webservice}.
 */
export type { Decoded, LoadOptions, LoadResult, WebserviceConfig, WebserviceProps } from './core/types.js';

/**
 * Thin `fetch` wrapper used by default, and the contract alternative providers implement.
 */
export { FetchClient, type FetchClientOptions } from './fetch/client.js';
export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderField,
  QueryParameter,
} from './types/request.js';

/**
 * Union of the errors `load` resolves with.
 */
export type { ApiError, ApiErrorKind } from './error/apiError.js';

/**
 * Error representing a non-2xx HTTP response.
 */
export { HTTPError, isHttpError } from './error/httpError.js';

/**
 * Error thrown when a body does not decode into the expected shape.
 */
export { DecodeError, isDecodeError } from './error/decodeError.js';

/**
 * Error representing a transport failure or anything else unclassified.
 */
export { isUnknownError, UnknownError } from './error/unknownError.js';

/**
 * Error representing a URL that could not be assembled.
 */
export { ConstructURLError, isConstructURLError } from './error/constructUrlError.js';

/**
 * Error raised when a request is aborted.
 */
export { AbortError, isAbortError } from './error/abortError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

/** Property-list backed secret lookup. */
export { readSecret } from './secrets/reader.js';

/** Error-first tuple types returned by `load`. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
