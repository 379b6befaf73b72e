import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ApiError } from '../error/apiError.js';
import type { FetchClientOptions } from '../fetch/client.js';
import type { FetchClientProvider, HeaderField } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Runtime configuration accepted by `Webservice.config`. */
export interface WebserviceConfig extends FetchClientOptions {
  /** Header fields sent ahead of the per-call fields on every request. */
  headerFields?: readonly HeaderField[];
  /**
   * Property-list file used by `getKeyFor`.
   * @default 'api-keys.plist'
   */
  secretsPath?: string;
}

/** Configuration for constructing a {@link Webservice}, extends {@link WebserviceConfig}. */
export interface WebserviceProps extends WebserviceConfig {
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Logger for request diagnostics. Defaults to a pino logger at `WEBSERVICE_LOG_LEVEL` or `warn`. */
  logger?: Logger;
}

/** Per-call options for `Webservice.load`. */
export interface LoadOptions {
  /** Abort signal to cancel the request; an abort resolves the load with an `UnknownError`. */
  signal?: AbortSignal;
}

/** Value a schema decodes a response body into. */
export type Decoded<Schema extends StandardSchemaV1> = StandardSchemaV1.InferOutput<Schema>;

/** Result of `Webservice.load`: exactly one of an {@link ApiError} or the decoded value. */
export type LoadResult<Schema extends StandardSchemaV1> = SafeWrapAsync<ApiError, Decoded<Schema>>;
