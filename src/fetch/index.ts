/**
 * Fetch entrypoint: exports the default fetch provider and header helpers.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
