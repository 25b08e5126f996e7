/**
 * Root entrypoint for rapidpro-client: re-exports the v2 client and models, the
 * cursor and query building blocks, codecs and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Typed RapidPro API v2 client, its option and input types, and resource models.
 */
export * from './v2/index.js';

/**
 * Cursor, query and executor building blocks.
 */
export {
  type CursorOptions,
  type Logger,
  type Page,
  type PageSource,
  Query,
  QueryCursor,
  type Reference,
  RequestExecutor,
  type WireInput,
} from './core/index.js';

/**
 * Field codecs and the microsecond {@link Timestamp}.
 */
export * from './codec/index.js';

/**
 * Declarative models, for resources or nested shapes not covered by the built-in ones.
 */
export * from './model/index.js';

/**
 * Default fetch transport.
 */
export { FetchClient } from './fetch/index.js';

/**
 * Transport contract for custom fetch providers.
 */
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  HttpMethod,
} from './types/request.js';

/** JSON values as they travel on the wire. */
export type { JsonObject, JsonValue } from './types/json.js';

/**
 * Error taxonomy and helpers.
 */
export * from './error/index.js';

/** Error-first tuple types returned by every fallible call. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

export { VERSION } from './version.js';
