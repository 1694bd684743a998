export type Success<T> = { data: T; error: null };
export type Failure<E> = { data: null; error: E };
export type Result<T, E = Error> = Success<T> | Failure<E>;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isPromiseLike<T>(value: T | Promise<T>): value is Promise<T> {
  return value instanceof Promise;
}

/**
 * Run a function and return its outcome as `{ data, error }` instead of throwing.
 * Async functions give back a promise of the same shape.
 */
export function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T>>;
export function tryCatch<T>(fn: () => T): Result<T>;
export function tryCatch<T>(fn: () => T | Promise<T>): Result<T> | Promise<Result<T>> {
  try {
    const value = fn();
    if (isPromiseLike(value)) {
      return value.then(
        (data): Result<T> => ({ data, error: null }),
        (error: unknown): Result<T> => ({ data: null, error: toError(error) })
      );
    }
    return { data: value, error: null };
  } catch (error) {
    return { data: null, error: toError(error) };
  }
}
