import type { FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options to configure the {@link FetchClient} wrapper. */
export interface FetchClientOptions {
  /**
   * Fetch cache mode.
   * {@link RequestCache}
   * @default 'force-cache'
   */
  cache?: RequestCache;
  /**
   * Fetch credentials mode.
   * {@link RequestCredentials}
   */
  credentials?: RequestCredentials;
  /** Fetch mode.
   * {@link RequestMode}
   */
  mode?: RequestMode;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - merges default and per-request options,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * It does not look at the status code; any response `fetch` resolves with is returned.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default fetch options (cache, credentials, mode). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client with default options */
  constructor(opts?: FetchClientOptions) {
    this.#opts = { ...opts, cache: opts?.cache ?? 'force-cache' };
  }

  /**
   * Updates default fetch options; keys left undefined keep their current value.
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      cache: opts.cache ?? this.#opts.cache,
      credentials: opts.credentials ?? this.#opts.credentials,
      mode: opts.mode ?? this.#opts.mode,
    };
  }

  /**
   * Executes a GET request against an absolute URL.
   *
   * @param url - Fully constructed request URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request(url, 'GET', opts);
  }

  /**
   * Delegates to the native `fetch` API; rejections (network failure, abort, invalid header)
   * are wrapped in an `Error` with the original as `cause`.
   */
  async #request(url: string, method: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        method,
        cache: opts.cache ?? this.#opts.cache,
        credentials: opts.credentials ?? this.#opts.credentials,
        mode: opts.mode ?? this.#opts.mode,
        headers: opts.headers ?? [],
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }
}
