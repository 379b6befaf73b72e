import type { StandardSchemaV1 } from '@standard-schema/spec';
import { AbortError } from '../error/abortError.js';
import { HTTPError } from '../error/httpError.js';
import { UnknownError } from '../error/unknownError.js';
import { FetchClient } from '../fetch/client.js';
import { toHeaderEntries } from '../fetch/utils.js';
import { readSecret } from '../secrets/reader.js';
import type {
  FetchClientProviderDefinition,
  HeaderEntries,
  HeaderField,
  QueryParameter,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { decode } from '../utils/decode.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { mergeSignals } from '../utils/signals.js';
import { safeWrapAsync } from '../utils/wrap.js';
import type { LoadOptions, LoadResult, WebserviceConfig, WebserviceProps } from './types.js';

/** A status any HTTP server could send; anything else means no recognizable response arrived. */
function isHttpStatus(status: unknown): status is number {
  return typeof status === 'number' && Number.isInteger(status) && status >= 100 && status <= 599;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Loads JSON resources over GET and decodes them into typed values.
 *
 * - builds the URL from a base URL and ordered query parameters,
 * - sends default and per-call header fields in order,
 * - classifies the response and decodes 2xx bodies with a Standard Schema.
 *
 * `load` never rejects; it resolves to an error-first tuple holding one {@link ApiError} or the decoded value.
 * The client keeps no per-call state, so one instance can be shared by concurrent callers.
 */
export class Webservice {
  static #shared: Webservice | undefined;

  /** Process-wide instance with default options, created on first access. */
  static get shared(): Webservice {
    Webservice.#shared ??= new Webservice();
    return Webservice.#shared;
  }

  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Header fields sent ahead of the per-call fields. */
  #headerFields: readonly HeaderField[];
  /** Property-list file read by {@link Webservice.getKeyFor}. */
  #secretsPath: string | undefined;
  #logger: Logger;
  /** Aborted on dispose, cancelling every in-flight load */
  #abortController: AbortController;

  /**
   * @param props - Fetch defaults, default header fields, secrets path and an optional provider or logger.
   */
  constructor({ fetchProvider = FetchClient, headerFields = [], secretsPath, logger, ...fetchOpts }: WebserviceProps = {}) {
    this.#fetchClient = new fetchProvider(fetchOpts);
    this.#headerFields = headerFields;
    this.#secretsPath = secretsPath;
    this.#logger = logger ?? createLogger();
    this.#abortController = new AbortController();
  }

  /**
   * Updates default header fields, the secrets path and fetch options at runtime.
   */
  config({ headerFields, secretsPath, ...fetchOpts }: WebserviceConfig) {
    if (headerFields) {
      this.#headerFields = headerFields;
    }

    if (secretsPath !== undefined) {
      this.#secretsPath = secretsPath;
    }

    this.#fetchClient.config(fetchOpts);
  }

  /**
   * Aborts every in-flight load. Loads started afterwards fail immediately with an {@link UnknownError}.
   */
  dispose() {
    this.#abortController.abort(new AbortError('client was disposed'));
  }

  /**
   * GETs `url` with the query parameters appended and decodes the JSON body with `schema`.
   *
   * Errors:
   * - {@link HTTPError} for a status outside 200-299; the body is not read.
   * - {@link DecodeError} for a body that is not JSON or does not match `schema`.
   * - {@link UnknownError} for a malformed URL, transport failure, abort, unreadable body or unrecognized response.
   *
   * @example
   * const [err, forecast] = await Webservice.shared.load(
   *   'https://api.example.com/forecast',
   *   z.object({ city: z.string(), temperature: z.number() }),
   *   [{ key: 'city', value: 'Oslo' }],
   *   [{ name: 'Authorization', value: `Bearer ${token}` }],
   * );
   */
  async load<Schema extends StandardSchemaV1>(
    url: string,
    schema: Schema,
    queryParameters: readonly QueryParameter[] = [],
    headerFields: readonly HeaderField[] = [],
    opts: LoadOptions = {},
  ): LoadResult<Schema> {
    const [errUrl, requestUrl] = constructUrl(url, queryParameters);
    if (errUrl) {
      this.#logger.debug({ err: errUrl }, 'error constructing URL');
      return [new UnknownError('error constructing URL in load', { cause: errUrl }), null];
    }

    this.#logger.debug({ url: requestUrl }, 'loading');

    const { signal, cleanup } = mergeSignals([opts.signal, this.#abortController.signal]);
    const result = await this.#request(requestUrl, schema, toHeaderEntries(this.#headerFields, headerFields), signal);
    cleanup();

    return result;
  }

  /**
   * Runs the GET and everything that depends on it: classification, body read and decoding.
   * Settles with a tuple on every path, so the caller can release the merged signal afterwards.
   */
  async #request<Schema extends StandardSchemaV1>(
    requestUrl: string,
    schema: Schema,
    headers: HeaderEntries,
    signal: AbortSignal | null,
  ): LoadResult<Schema> {
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      this.#fetchClient.get(requestUrl, { headers, ...(signal && { signal }) }),
    );
    if (errWrapped) {
      this.#logger.debug({ err: errWrapped, url: requestUrl }, 'error calling fetch provider');
      return [new UnknownError('error calling GET request in load', { cause: errWrapped }), null];
    }

    const [errRequest, response] = wrapped;
    if (errRequest) {
      this.#logger.debug({ err: errRequest, url: requestUrl }, 'error requesting');
      return [new UnknownError('error in GET request in load', { cause: errRequest }), null];
    }

    if (!isHttpStatus(response?.status)) {
      this.#logger.debug({ url: requestUrl }, 'error unrecognized response');
      return [new UnknownError('error unrecognized response in load'), null];
    }

    if (!isSuccessStatus(response.status)) {
      this.#logger.debug({ status: response.status, url: requestUrl }, 'error status');
      return [new HTTPError(response, `error in GET request, status ${response.status}`), null];
    }

    const [errBody, body] = await safeWrapAsync(() => response.text());
    if (errBody) {
      this.#logger.debug({ err: errBody, url: requestUrl }, 'error reading response body');
      return [new UnknownError('error reading response body in load', { cause: errBody }), null];
    }

    const [errDecode, decoded] = await decode(body, schema);
    if (errDecode) {
      this.#logger.debug({ err: errDecode, url: requestUrl }, 'error decoding');
      return [errDecode, null];
    }

    return [null, decoded];
  }

  /**
   * Reads the string stored under `name` in the configured property-list file, or `null` when it is
   * missing for any reason. Never rejects.
   */
  getKeyFor(name: string): Promise<string | null> {
    return readSecret(name, { path: this.#secretsPath, logger: this.#logger });
  }
}
