import {PackagingError} from './errors.js'

export type Ok<T> = {ok: true; value: T}
export type Err<E> = {ok: false; error: E}

/** Outcome of a packaging operation: a value, or the error that stopped it. */
export type Result<T, E = PackagingError> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return {ok: true, value}
}

export function err<E>(error: E): Err<E> {
  return {ok: false, error}
}

/**
 * Runs an operation whose lower layers throw, and turns a thrown
 * `PackagingError` into an `Err`. Anything else is mapped with `fallback`.
 */
export async function attempt<T>(
  operation: () => Promise<T>,
  fallback: (error: unknown) => PackagingError
): Promise<Result<T>> {
  try {
    return ok(await operation())
  } catch (error: unknown) {
    return err(error instanceof PackagingError ? error : fallback(error))
  }
}
