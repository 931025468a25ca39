import { BaseError } from "@tidecache/errors"
import {
  CacheError,
  emptyCacheError,
  invalidCapacityError,
  invalidPolicyError,
  notFoundError,
} from "../cache-error"

describe("CacheError factories", () => {
  it("notFoundError carries the key", () => {
    const err = notFoundError("k:one")

    expect(err).toBeInstanceOf(CacheError)
    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("CacheError")
    expect(err.code).toBe("not_found")
    expect(err.message).toBe("No cache entry for key: k:one")
    expect(err.context).toStrictEqual({ key: "k:one" })
    expect(err.isOperational).toBe(true)
  })

  it("emptyCacheError has no context", () => {
    const err = emptyCacheError()

    expect(err.code).toBe("empty_cache")
    expect(err.message).toBe("Cache has no keys")
    expect(err.context).toStrictEqual({})
  })

  it("invalidCapacityError carries the rejected capacity", () => {
    const err = invalidCapacityError(-1)

    expect(err.code).toBe("invalid_capacity")
    expect(err.message).toBe("Capacity must be a non-negative integer, got: -1")
    expect(err.context).toStrictEqual({ capacity: -1 })
  })

  it("invalidPolicyError carries the rejected policy", () => {
    const err = invalidPolicyError("fifo")

    expect(err.code).toBe("invalid_policy")
    expect(err.message).toBe(
      "Invalid eviction policy: fifo (expected one of lru, mru, lfu, random)",
    )
    expect(err.context).toStrictEqual({ policy: "fifo" })
  })
})
