import type { NestedModel } from '../codec/codecs.js';
import { NotFoundError } from '../error/notFoundError.js';
import type { ApiError, ClientError } from '../error/types.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { Logger, Page, PageSource } from './executor.js';
import type { Query } from './query.js';
import { executeWithRateLimit } from './rateLimit.js';

/** Options for a {@link QueryCursor}. */
export interface CursorOptions {
  /**
   * Wait out rate limits and re-issue the same request instead of returning {@link RateLimitError}.
   * @default false
   */
  retryOnRateExceed?: boolean;
  /**
   * Most times one page request is re-issued while rate-limited.
   * @default 5
   */
  rateLimitRetries?: number;
  /** Cancels in-flight requests and rate-limit waits. */
  signal?: AbortSignal | null;
  /** Logger for rate-limit waits; `null` keeps quiet. */
  logger?: Logger | null;
}

/**
 * Lazy, page-by-page iteration over the results of one {@link Query}.
 *
 * The cursor is either ready with the query for the next page, or exhausted.
 * A failed page leaves it where it was, so calling again re-issues the same request.
 * Results come back in server order; nothing is reordered or deduplicated. When
 * records may be created between page fetches, pin the result set with a filter
 * such as `before`.
 *
 * Not meant to be shared: requests are issued one at a time.
 */
export class QueryCursor<T> {
  #source: PageSource;
  #model: NestedModel<T>;
  #query: Query | null;
  #pagesFetched = 0;
  #retryOnRateExceed: boolean;
  #rateLimitRetries: number;
  #signal: AbortSignal | null;
  #logger: Logger | null;
  /** Tail of the request queue, one page at a time */
  #inFlight: Promise<unknown> = Promise.resolve();

  constructor(source: PageSource, query: Query, model: NestedModel<T>, opts: CursorOptions = {}) {
    this.#source = source;
    this.#query = query;
    this.#model = model;
    this.#retryOnRateExceed = opts.retryOnRateExceed ?? false;
    this.#rateLimitRetries = opts.rateLimitRetries ?? Number.POSITIVE_INFINITY;
    this.#signal = opts.signal ?? null;
    this.#logger = opts.logger ?? null;
  }

  /** Query the next page will be fetched with, `null` once exhausted. Hand it to `client.resume` to continue later. */
  get position(): Query | null {
    return this.#query;
  }

  /** Number of pages fetched successfully so far */
  get pagesFetched(): number {
    return this.#pagesFetched;
  }

  get exhausted(): boolean {
    return this.#query === null;
  }

  /**
   * Fetches and materializes the next page. Once exhausted this returns an empty
   * page without issuing a request.
   */
  nextPage(): SafeWrapAsync<ClientError, readonly T[]> {
    const run = this.#inFlight.then(() => this.#fetchNext());
    this.#inFlight = run;
    return run;
  }

  /**
   * Yields every page until the cursor is exhausted, or one failed page has been yielded.
   * Consuming it advances this cursor.
   */
  async *pages(): AsyncGenerator<SafeWrap<ClientError, readonly T[]>, void, undefined> {
    while (this.#query) {
      const page = await this.nextPage();
      yield page;

      if (page[0]) {
        return;
      }
    }
  }

  /** First result, or `undefined` when there is none. Stops fetching once one is found. */
  async first(): SafeWrapAsync<ClientError, T | undefined> {
    for await (const [err, items] of this.pages()) {
      if (err) {
        return [err, null];
      }

      if (items.length) {
        return [null, items[0]];
      }
    }

    return [null, undefined];
  }

  /** Like {@link first}, but a missing result is a {@link NotFoundError}. */
  async get(): SafeWrapAsync<ClientError, T> {
    const [err, item] = await this.first();
    if (err) {
      return [err, null];
    }

    if (item === undefined) {
      return [new NotFoundError(), null];
    }

    return [null, item];
  }

  /**
   * Every remaining result, in server order. Everything is held in memory, so
   * narrow the query when the result set may be large.
   */
  async all(): SafeWrapAsync<ClientError, T[]> {
    const results: T[] = [];
    for await (const [err, items] of this.pages()) {
      if (err) {
        return [err, null];
      }

      results.push(...items);
    }

    return [null, results];
  }

  async #fetchNext(): SafeWrapAsync<ClientError, readonly T[]> {
    const query = this.#query;
    if (!query) {
      return [null, []];
    }

    const [err, page] = await this.#fetchPage(query);
    if (err) {
      return [err, null];
    }

    const items: T[] = [];
    for (const raw of page.results) {
      const [errDecode, item] = this.#model.materialize(raw);
      if (errDecode) {
        return [errDecode, null];
      }

      items.push(item);
    }

    this.#query = page.next ? query.withNext(page.next) : null;
    this.#pagesFetched += 1;
    return [null, Object.freeze(items)];
  }

  #fetchPage(query: Query): SafeWrapAsync<ApiError, Page> {
    return executeWithRateLimit(
      this.#source,
      query,
      { method: 'GET', envelope: 'collection', signal: this.#signal },
      { retryOnRateExceed: this.#retryOnRateExceed, rateLimitRetries: this.#rateLimitRetries, logger: this.#logger },
    );
  }
}
