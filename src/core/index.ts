/**
 * Core entrypoint: exports the Webservice client and its option types.
 * @module
 */
export { Webservice } from './client.js';
export type { Decoded, LoadOptions, LoadResult, WebserviceConfig, WebserviceProps } from './types.js';
