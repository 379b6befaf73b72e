import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a status code outside 200-299.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  name = 'HTTPError';
  /** Discriminant within {@link ApiError} */
  readonly kind = 'http';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Status code of the response */
  get status(): number {
    return this.#response.status;
  }

  /**
   * Response causing the HTTPError, cloned so the body stays unread
   */
  get response(): Response {
    return this.#response.clone?.() ?? this.#response;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
