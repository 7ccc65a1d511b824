/**
 * Fetch entrypoint: exports the fetch client and supporting helpers.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
