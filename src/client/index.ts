/**
 * Client entrypoint: exports the REST client and its props.
 * @module
 */
export { ApiClient } from './client.js';
export { clientPropsSchema } from './schema.js';
export type { ApiClientProps, RequestArgs, ResourceOptions } from './types.js';
