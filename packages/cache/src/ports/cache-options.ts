import type { Milliseconds } from "@tidecache/clock"
import type { CacheEvictionPolicy } from "./cache-eviction-policy"

/** Sweep period used when `clearingIntervalMs` is 0. */
export const DEFAULT_CLEARING_INTERVAL_MS: Milliseconds = 100_000

export type MemoryCacheOptions = {
  /**
   * Maximum number of live entries. 0 means unbounded.
   *
   * Reaching it makes the next write of a new key evict exactly one entry
   * chosen by the eviction policy.
   */
  capacity: number

  /** Period of the background expiry sweep. 0 selects the default. */
  clearingIntervalMs: Milliseconds

  evictionPolicy: CacheEvictionPolicy

  /** Bound into every log entry as `cache`. */
  name?: string
}
