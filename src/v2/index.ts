/**
 * RapidPro API v2 entrypoint: the typed client and resource models.
 * @module
 */
export * from './client.js';
export * from './models.js';
