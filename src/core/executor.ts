import { z } from 'zod';
import { classify } from '../error/classify.js';
import { ConnectionError } from '../error/connectionError.js';
import { getHttpError } from '../error/httpError.js';
import { ProtocolError } from '../error/protocolError.js';
import type { ApiError } from '../error/types.js';
import type { FetchClientProviderDefinition, FetchOptions, HttpMethod } from '../types/request.js';
import type { JsonObject } from '../types/json.js';
import { parseJson, readResponseText } from '../utils/responseBody.js';
import { createTimeoutSignal, linkSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { Query } from './query.js';

/** Where debug lines go. */
export type Logger = Pick<Console, 'debug'>;

/** One batch of raw results plus the continuation link, as returned by one request. */
export interface Page {
  readonly results: readonly unknown[];
  readonly next: string | null;
}

/** How a 2xx body is shaped: `none` ignores whatever comes back. */
export type Envelope = 'collection' | 'object' | 'none';

/** Per-call options for {@link RequestExecutor.execute}. */
export interface ExecuteOptions {
  method: HttpMethod;
  /** `collection` for `{ results, next }` bodies, `object` for a bare object, `none` for deletes and bulk actions */
  envelope: Envelope;
  /** JSON payload, POST only */
  body?: JsonObject;
  signal?: AbortSignal | null;
}

/** What a cursor needs to fetch pages. */
export interface PageSource {
  execute(query: Query, opts: ExecuteOptions): SafeWrapAsync<ApiError, Page>;
  /** Aborts once the source is disposed; rate-limit waits watch it too. */
  readonly signal?: AbortSignal;
}

/** Runtime settings of {@link RequestExecutor}. */
export interface ExecutorOptions {
  /**
   * Request timeout in milliseconds, `false` disables.
   * @default 60000
   */
  timeout?: number | false;
  /** Logger for request/response lines; `null` keeps quiet. */
  logger?: Logger | null;
}

const collectionSchema = z.object({
  results: z.array(z.record(z.string(), z.unknown())),
  next: z.string().nullable().optional(),
});

const objectSchema = z.record(z.string(), z.unknown());

/**
 * Issues exactly one request per call and maps the outcome onto {@link Page} or an {@link ApiError}.
 *
 * No retry happens here; rate-limit handling is left to the cursor so single
 * writes never repeat.
 */
export class RequestExecutor implements PageSource {
  #transport: FetchClientProviderDefinition;
  #timeout: number | false;
  #logger: Logger | null;
  /** Global abort-controller for disposing */
  #abortController = new AbortController();

  constructor(transport: FetchClientProviderDefinition, opts: ExecutorOptions = {}) {
    this.#transport = transport;
    this.#timeout = opts.timeout ?? 60_000;
    this.#logger = opts.logger ?? null;
  }

  /** Updates timeout and logging at runtime. */
  config(opts: ExecutorOptions) {
    if (opts.timeout !== undefined) {
      this.#timeout = opts.timeout;
    }

    if (opts.logger !== undefined) {
      this.#logger = opts.logger;
    }
  }

  /** Aborts in-flight requests; later requests fail straight away with a {@link ConnectionError}. */
  dispose() {
    this.#abortController.abort('client was disposed');
    this.#transport.dispose?.();
  }

  /** Aborted by {@link RequestExecutor.dispose}. */
  get signal(): AbortSignal {
    return this.#abortController.signal;
  }

  async execute(query: Query, opts: ExecuteOptions): SafeWrapAsync<ApiError, Page> {
    const linked = linkSignals([opts.signal, createTimeoutSignal(this.#timeout), this.#abortController.signal]);
    try {
      return await this.#execute(query, opts, linked.signal);
    } finally {
      linked.release();
    }
  }

  async #execute(
    query: Query,
    { method, envelope, body }: ExecuteOptions,
    signal: AbortSignal | null,
  ): SafeWrapAsync<ApiError, Page> {
    const url = query.url;
    const payload = body === undefined ? undefined : JSON.stringify(body);
    this.#logger?.debug(payload ? `${method} ${url} ${payload}` : `${method} ${url}`);

    const requestOptions: FetchOptions = { ...(signal && { signal }) };

    const [errWrapped, wrapped] = await safeWrapAsync(() => {
      switch (method) {
        case 'GET':
          return this.#transport.get(url, requestOptions);
        case 'POST':
          return this.#transport.post(url, { ...requestOptions, body: payload });
        case 'DELETE':
          return this.#transport.delete(url, requestOptions);
      }
    });

    if (errWrapped) {
      return [new ConnectionError(`error calling ${method} ${url}`, { cause: errWrapped }), null];
    }

    const [errTransport, response] = wrapped;
    if (errTransport) {
      const httpError = getHttpError(errTransport);
      if (!httpError) {
        return [new ConnectionError(`error sending ${method} ${url}`, { cause: errTransport }), null];
      }

      this.#logger?.debug(` -> ${httpError.status}`);
      const [errBody, rawBody] = await readResponseText(httpError.response);
      if (errBody) {
        return [new ConnectionError(`error reading ${method} ${url} response`, { cause: errBody }), null];
      }

      return [classify(httpError.status, rawBody, httpError.response.headers), null];
    }

    this.#logger?.debug(` -> ${response.status}`);
    const [errBody, rawBody] = await readResponseText(response);
    if (errBody) {
      return [new ConnectionError(`error reading ${method} ${url} response`, { cause: errBody }), null];
    }

    if (envelope === 'none' || (rawBody === null && envelope === 'collection')) {
      return [null, { results: [], next: null }];
    }

    if (rawBody === null) {
      const message = `error reading ${method} ${url} response, expected an object`;
      return [new ProtocolError(message, response.status, null), null];
    }

    const [errJson, json] = parseJson(rawBody);
    if (errJson) {
      const err = new ProtocolError(`error parsing ${method} ${url} response`, response.status, rawBody, {
        cause: errJson,
      });
      return [err, null];
    }

    if (envelope === 'object') {
      const parsed = objectSchema.safeParse(json);
      if (!parsed.success) {
        const message = `error reading ${method} ${url} response, expected an object`;
        return [new ProtocolError(message, response.status, rawBody, { cause: parsed.error }), null];
      }

      return [null, { results: [parsed.data], next: null }];
    }

    const parsed = collectionSchema.safeParse(json);
    if (!parsed.success) {
      const message = `error reading ${method} ${url} response, expected a results envelope`;
      return [new ProtocolError(message, response.status, rawBody, { cause: parsed.error }), null];
    }

    return [null, { results: parsed.data.results, next: parsed.data.next ?? null }];
  }
}
