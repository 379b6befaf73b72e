/**
 * Secrets entrypoint: property-list backed key lookup.
 * @module
 */
export { DEFAULT_SECRETS_PATH, type ReadSecretOptions, readSecret } from './reader.js';
