/**
 * Least Recently Used (LRU) eviction policy.
 *
 * Evicts the entry that has not been read or written for the longest time.
 * Common default for memory caches with good hit-rate characteristics.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * Most Recently Used (MRU) eviction policy.
 *
 * Evicts the entry that was touched last. Useful for cyclic scans where the
 * newest item is the one least likely to be needed again soon.
 */
export type MruCacheEvictionPolicy = "mru"

/**
 * Least Frequently Used (LFU) eviction policy.
 *
 * Evicts the entry with the lowest access counter. Ties go to the entry
 * met first in table order.
 */
export type LfuCacheEvictionPolicy = "lfu"

/**
 * Random eviction policy.
 *
 * Evicts an entry chosen uniformly at random from the live keys.
 */
export type RandomCacheEvictionPolicy = "random"

export type CacheEvictionPolicy =
  | LruCacheEvictionPolicy
  | MruCacheEvictionPolicy
  | LfuCacheEvictionPolicy
  | RandomCacheEvictionPolicy

export const cacheEvictionPolicies = ["lru", "mru", "lfu", "random"] as const satisfies
  readonly CacheEvictionPolicy[]

export function isCacheEvictionPolicy(value: unknown): value is CacheEvictionPolicy {
  return cacheEvictionPolicies.some((policy) => policy === value)
}

/** Display name used in stats reports. */
export function evictionPolicyName(policy: CacheEvictionPolicy): Uppercase<CacheEvictionPolicy> {
  switch (policy) {
    case "lru":
      return "LRU"
    case "mru":
      return "MRU"
    case "lfu":
      return "LFU"
    case "random":
      return "RANDOM"
  }
}
