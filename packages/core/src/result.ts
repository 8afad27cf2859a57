/**
 * Result type for explicit error handling.
 * Expected failures (registry loading, batch items) are returned, not thrown.
 */

/**
 * Success result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error result
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Either Ok(value) or Err(error)
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Unwrap a result, throwing the error if there is one
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Settle a promise into a Result, converting the rejection reason with `toError`
 */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  toError: (reason: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (reason) {
    return err(toError(reason));
  }
}

/**
 * Partition results into successes and failures
 */
export function partition<T, E>(
  results: Result<T, E>[]
): { successes: T[]; failures: E[] } {
  const successes: T[] = [];
  const failures: E[] = [];

  for (const result of results) {
    if (result.ok) {
      successes.push(result.value);
    } else {
      failures.push(result.error);
    }
  }

  return { successes, failures };
}
