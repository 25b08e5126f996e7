import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; `null` removes a header set further up. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null>;

/** HTTP methods the API is called with. */
export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal | null;
  /** Serialized request body. */
  body?: string;
  /** HTTP method, set by the verb helpers. */
  method?: HttpMethod;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
}

/**
 * Contract for HTTP client implementations used by the API client.
 * Non-2xx responses come back as an `HTTPError` carrying the response; transport
 * failures as a plain `Error` with the failure as `cause`.
 */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
