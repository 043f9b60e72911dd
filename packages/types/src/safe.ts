import * as _ from 'radash'

/**
 * Result tuples used instead of throwing across package boundaries.
 * `[error, undefined]` on failure, `[undefined, value]` on success.
 */

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafePromise<T, E extends Error | string = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Normalise anything caught into an Error, keeping the original as `cause`
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value), { cause: value })
}

export async function safeTry<T>(promise: Promise<T>): SafePromise<T> {
  const [error, result] = await _.try(() => promise)()
  if (error) return safeError(toError(error))
  return safeResult(result)
}

/**
 * Run a synchronous function that may throw
 */
export function safeCall<T>(fn: () => T): Safe<T> {
  try {
    return safeResult(fn())
  } catch (error) {
    return safeError(toError(error))
  }
}
