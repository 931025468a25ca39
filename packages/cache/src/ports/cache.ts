import type { Milliseconds } from "@tidecache/clock"
import type { CacheEvictionPolicy } from "./cache-eviction-policy"
import type { CacheResult } from "./cache-result"
import type { CacheStats } from "./cache-stats"

/**
 * Cache represents a bounded, in-process store for derived data.
 *
 * @remarks
 * - Entries may be evicted at any time once the capacity is reached.
 * - TTLs slide: every successful read restarts an entry's time to live.
 * - Fallible operations return a {@link CacheResult}; they do not throw.
 *
 * If losing this data would cause an incident, it does not belong behind this port.
 */
export interface Cache<K, V> {
  /**
   * Read a live entry.
   *
   * @remarks
   * A hit bumps the entry's counter, refreshes its last access time and
   * makes it the most recently used key. An expired entry is removed and
   * reported as `not_found`.
   */
  get(key: K): CacheResult<V, "not_found">

  /**
   * Store a value, replacing any existing entry for the key.
   *
   * @remarks
   * Writing into a full cache evicts one entry first, even when the key is
   * already present; the victim may then be that key, which is written back.
   *
   * @param ttlMs Time to live after the last access. 0 (default) never
   * expires, and so does a non-finite value. A negative value leaves the
   * entry already expired.
   */
  set(key: K, value: V, ttlMs?: Milliseconds): void

  delete(key: K): CacheResult<void, "not_found">

  clear(): void

  /** Live keys in write order. Fails with `empty_cache` when there are none. */
  keys(): CacheResult<K[], "empty_cache">

  /** Live keys, most recently used first. */
  keysByRecency(): K[]

  getAll(): V[]

  /**
   * Replace an entry's TTL without touching its last access time. The TTL is
   * read the same way as in {@link Cache.set}.
   */
  setTtl(key: K, ttlMs: Milliseconds): CacheResult<void, "not_found">

  getTtl(key: K): CacheResult<Milliseconds, "not_found">

  /** Number of writes and reads recorded for the entry since it was last set. */
  getCounter(key: K): CacheResult<number, "not_found">

  /**
   * Change the capacity. A smaller value does not evict anything until the
   * next write.
   */
  setCapacity(capacity: number): CacheResult<void, "invalid_capacity">

  capacity(): number

  /**
   * Switch the eviction policy. Accepts any string so that untrusted input
   * can be passed through and validated here.
   */
  setEvictionPolicy(policy: string): CacheResult<void, "invalid_policy">

  evictionPolicy(): CacheEvictionPolicy

  /** Entry count, expired entries that were not swept yet included. */
  size(): number

  stats(): CacheStats<K, V>

  /** Remove every expired entry now and return how many were removed. */
  sweep(): number

  /** Stop background work. Reads and writes keep working afterwards. */
  close(): Promise<void>
}
