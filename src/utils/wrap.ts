/**
 * Tuple-based result used throughout the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/** Builds the success side of a {@link SafeWrap}. */
export function ok<DataType>(data: DataType): [error: null, data: DataType] {
  return [null, data];
}

/** Builds the failure side of a {@link SafeWrap}. */
export function fail<ErrorType>(error: ErrorType): [error: ErrorType, data: null] {
  return [error, null];
}

/**
 * Normalizes whatever was thrown into an `Error`, keeping the original as `cause`
 * when it wasn't one already.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }

  return new Error(`non-error value thrown: ${String(thrown)}`, { cause: thrown });
}

/**
 * Gracefully handles a given Promise factory.
 * @example
 * const [error, data] = await safeWrapAsync(() => asyncAction());
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return ok(data);
  } catch (error) {
    return fail(toError(error));
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    return ok(fn());
  } catch (error) {
    return fail(toError(error));
  }
}
