/**
 * Core entrypoint: queries, the request executor and lazy cursors.
 * Import from here to drive endpoints the typed client does not wrap.
 * @module
 */

/**
 * Lazy, page-by-page iteration over one query's results.
 */
export { type CursorOptions, QueryCursor } from './cursor.js';

/**
 * Issues one request per call and maps the outcome onto a page or an API error.
 */
export {
  type Envelope,
  type ExecuteOptions,
  type ExecutorOptions,
  type Logger,
  type Page,
  type PageSource,
  RequestExecutor,
} from './executor.js';

/**
 * Immutable filtered request against a resource, plus filter and payload serialization.
 */
export {
  buildParams,
  buildPayload,
  Query,
  type QueryParam,
  type Reference,
  toWireValue,
  type WireInput,
} from './query.js';

/**
 * Rate-limit aware execution shared by cursors and single reads.
 */
export { executeWithRateLimit, type RateLimitPolicy } from './rateLimit.js';
