import { isErrorType } from './isErrorType.js';

/**
 * Error representing any failure that is neither an HTTP status error nor a decode error:
 * transport failures, aborts, malformed URLs and unrecognized responses. The underlying error is kept as `cause`.
 */
export class UnknownError extends Error {
  /** UnknownError error-name */
  name = 'UnknownError';
  /** Discriminant within {@link ApiError} */
  readonly kind = 'unknown';
}

/**
 * Type guard for {@link UnknownError}.
 */
export function isUnknownError(error: unknown): error is UnknownError {
  return isErrorType(UnknownError, error);
}
