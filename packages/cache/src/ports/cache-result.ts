import type { CacheError, CacheErrorCode } from "../core/errors/cache-error"

export type CacheOk<T> = {
  ok: true
  value: T
}

export type CacheFailure<C extends CacheErrorCode> = {
  ok: false
  error: CacheError<C>
}

/**
 * Outcome of a fallible cache operation. `C` narrows the error codes the
 * operation can report.
 */
export type CacheResult<T, C extends CacheErrorCode = CacheErrorCode> =
  | CacheOk<T>
  | CacheFailure<C>

export function ok<T>(value: T): CacheOk<T> {
  return { ok: true, value }
}

export function fail<C extends CacheErrorCode>(error: CacheError<C>): CacheFailure<C> {
  return { ok: false, error }
}
