import { HTTPError } from '../error/httpError.js';
import type { FetchClientOptions, FetchOptions, HttpMethod } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Default transport, backed by the global `fetch`.
 *
 * Relative endpoints (`contacts.json?group=...`) are resolved against the API root,
 * absolute ones (the `next` links RapidPro hands out) are requested as given.
 * A non-2xx response comes back as an {@link HTTPError} holding the response, so
 * the caller can still read its body and headers.
 */
export class FetchClient {
  #rootUrl: string;
  #opts: FetchClientOptions;

  constructor(rootUrl: string, opts?: FetchClientOptions) {
    this.#rootUrl = rootUrl.endsWith('/') ? rootUrl : `${rootUrl}/`;
    this.#opts = opts ?? {};
  }

  /** Replaces default options; headers are merged, `null` values removing one. */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  public get(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#send('GET', endpoint, opts);
  }

  /** `opts.body` is the already serialized JSON payload. */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#send('POST', endpoint, opts);
  }

  public delete(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#send('DELETE', endpoint, opts);
  }

  async #send(method: HttpMethod, endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const url = this.#resolve(endpoint);
    const init: RequestInit = {
      body: opts.body,
      method,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
      ...(opts.signal && { signal: opts.signal }),
    };

    const [err, res] = await safeWrapAsync(() => fetch(url, init));
    if (err) {
      return [new Error(`error sending ${method} ${url}`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error ${method} ${url} returned ${res.status}`), null];
    }

    return [null, res];
  }

  #resolve(endpoint: string): string {
    if (ABSOLUTE_URL.test(endpoint)) {
      return endpoint;
    }

    return `${this.#rootUrl}${endpoint.replace(/^\//, '')}`;
  }
}
