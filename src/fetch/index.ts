/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export type { FetchOptions, HeaderEntries } from '../types/request.js';
export { FetchClient, type FetchClientOptions } from './client.js';
export { toHeaderEntries } from './utils.js';
