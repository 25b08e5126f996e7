import { AbortError } from '../error/abortError.js';
import { ConnectionError } from '../error/connectionError.js';
import { RateLimitError } from '../error/rateLimitError.js';
import type { ApiError } from '../error/types.js';
import { retry } from '../utils/retry.js';
import { linkSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { ExecuteOptions, Logger, Page, PageSource } from './executor.js';
import type { Query } from './query.js';

/** How a read reacts to `429 Too Many Requests`. */
export interface RateLimitPolicy {
  /** Wait out the limit and re-issue the request, instead of returning {@link RateLimitError} */
  retryOnRateExceed: boolean;
  /** Most re-issues of one request */
  rateLimitRetries: number;
  logger: Logger | null;
}

/**
 * Executes a read, sleeping for the server's `Retry-After` and re-issuing the
 * same query while rate-limited and the policy allows. Once retries run out the
 * last {@link RateLimitError} is returned. A wait ends early when the caller's
 * signal aborts or the source is disposed, and becomes a {@link ConnectionError}.
 */
export async function executeWithRateLimit(
  source: PageSource,
  query: Query,
  opts: ExecuteOptions,
  policy: RateLimitPolicy,
): SafeWrapAsync<ApiError, Page> {
  const wait = linkSignals([opts.signal, source.signal]);
  const [err, page] = await retry({
    fn: () => source.execute(query, opts),
    attempts: policy.retryOnRateExceed ? policy.rateLimitRetries : 0,
    delay: (e) => (e instanceof RateLimitError ? e.retryAfterSeconds * 1000 : null),
    onRetry: (_e, attempt, waitMs) =>
      policy.logger?.debug(`rate limited on ${query.path}, retry ${attempt} in ${waitMs}ms`),
    signal: wait.signal,
  });
  wait.release();

  if (err instanceof AbortError) {
    return [new ConnectionError('error waiting out rate limit', { cause: err }), null];
  }

  if (err) {
    return [err, null];
  }

  return [null, page];
}
