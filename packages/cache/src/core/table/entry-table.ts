import type { Milliseconds } from "@tidecache/clock"
import type { CacheEntry } from "../../ports/cache-entry"

/**
 * Read side of the entry table, as seen by eviction strategies.
 */
export interface EntryTableView<K> {
  readonly size: number

  keys(): IterableIterator<K>

  /** Live entries in table order (oldest write first). */
  entries(): IterableIterator<[K, Readonly<CacheEntry<unknown>>]>
}

/**
 * Authoritative key to entry mapping.
 *
 * Holds no policy knowledge and never checks expiry: callers decide what an
 * elapsed TTL means.
 */
export class EntryTable<K, V> implements EntryTableView<K> {
  private readonly map = new Map<K, CacheEntry<V>>()

  get size(): number {
    return this.map.size
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  /**
   * Write a fresh entry, replacing any existing one. A replaced key moves to
   * the end of table order, like a new write.
   */
  insert(key: K, value: V, ttlMs: Milliseconds, nowMs: Milliseconds): void {
    this.map.delete(key)
    this.map.set(key, { value, ttlMs, accessCount: 1, lastAccessMs: nowMs })
  }

  lookup(key: K): Readonly<CacheEntry<V>> | undefined {
    return this.map.get(key)
  }

  /** Record a read: bump the counter and refresh the timestamp. */
  touch(key: K, nowMs: Milliseconds): boolean {
    const entry = this.map.get(key)
    if (entry === undefined) return false

    entry.accessCount++
    entry.lastAccessMs = nowMs

    return true
  }

  /** Replace the TTL without resetting the access timestamp. */
  setTtl(key: K, ttlMs: Milliseconds): boolean {
    const entry = this.map.get(key)
    if (entry === undefined) return false

    entry.ttlMs = ttlMs

    return true
  }

  remove(key: K): boolean {
    return this.map.delete(key)
  }

  clear(): void {
    this.map.clear()
  }

  keys(): IterableIterator<K> {
    return this.map.keys()
  }

  values(): V[] {
    return Array.from(this.map.values(), (entry) => entry.value)
  }

  entries(): IterableIterator<[K, Readonly<CacheEntry<V>>]> {
    return this.map.entries()
  }
}
