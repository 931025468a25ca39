import type { Milliseconds } from "@tidecache/clock"
import type { CacheEvictionPolicy } from "./cache-eviction-policy"

export type CacheStatsEntry<K, V> = {
  key: K
  value: V
  ttlMs: Milliseconds
  accessCount: number
  lastAccess: Date
}

/**
 * Point-in-time snapshot of a cache. Taking one never mutates the cache.
 */
export type CacheStats<K, V> = {
  evictionPolicy: CacheEvictionPolicy

  /** 0 means unlimited. */
  capacity: number

  clearingIntervalMs: Milliseconds
  size: number

  /** `100 * size / capacity`, or 0 when the capacity is unlimited. */
  occupancy: number

  /** In table order, expired entries that were not swept yet included. */
  entries: CacheStatsEntry<K, V>[]
}
