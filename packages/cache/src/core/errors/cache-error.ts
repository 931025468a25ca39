import { BaseError } from "@tidecache/errors"

export const cacheErrorCodes = [
  "not_found",
  "empty_cache",
  "invalid_capacity",
  "invalid_policy",
] as const

export type CacheErrorCode = (typeof cacheErrorCodes)[number]

export class CacheError<C extends CacheErrorCode = CacheErrorCode> extends BaseError<C> {}

/** Absent and expired keys are reported the same way. */
export function notFoundError(key: unknown): CacheError<"not_found"> {
  return new CacheError(`No cache entry for key: ${String(key)}`, {
    code: "not_found",
    context: { key },
  })
}

export function emptyCacheError(): CacheError<"empty_cache"> {
  return new CacheError("Cache has no keys", { code: "empty_cache" })
}

export function invalidCapacityError(capacity: number): CacheError<"invalid_capacity"> {
  return new CacheError(`Capacity must be a non-negative integer, got: ${capacity}`, {
    code: "invalid_capacity",
    context: { capacity },
  })
}

export function invalidPolicyError(policy: unknown): CacheError<"invalid_policy"> {
  return new CacheError(
    `Invalid eviction policy: ${String(policy)} (expected one of lru, mru, lfu, random)`,
    { code: "invalid_policy", context: { policy } },
  )
}
