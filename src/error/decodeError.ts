import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response body that is not JSON, or does not match the expected schema.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  name = 'DecodeError';
  /** Discriminant within {@link ApiError} */
  readonly kind = 'decode';
  /** Schema validation issues, empty when the body could not be parsed at all */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the DecodeError that extends Error, with accompanying Issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${JSON.stringify(issues)}` : message, opts);

    this.issues = [...issues];
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
