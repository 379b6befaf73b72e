import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** One HTTP request header. Duplicated names are sent once per entry. */
export interface HeaderField {
  readonly name: string;
  readonly value: string;
}

/** One URL query component, serialized in list order. */
export interface QueryParameter {
  readonly key: string;
  readonly value: string;
}

/** Ordered `[name, value]` pairs handed to `fetch`. */
export type HeaderEntries = Array<[name: string, value: string]>;

/** Options to pass in for each fetch request */
export interface FetchOptions extends Pick<RequestInit, 'cache' | 'credentials' | 'mode'> {
  /** Headers in the order they are sent. */
  headers?: HeaderEntries;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Contract for HTTP client implementations used by Webservice. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request against an absolute URL. */
  get: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client with default options */
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}
