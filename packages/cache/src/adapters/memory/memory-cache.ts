import type { Clock, Milliseconds } from "@tidecache/clock"
import type { Logger } from "@tidecache/logger"
import {
  emptyCacheError,
  invalidCapacityError,
  invalidPolicyError,
  notFoundError,
} from "../../core/errors/cache-error"
import { createEvictionStrategy } from "../../core/eviction/create-eviction-strategy"
import type { EvictionStrategy } from "../../core/eviction/eviction-strategy"
import { ExpirySweeper } from "../../core/expiry/expiry-sweeper"
import { isExpired } from "../../core/expiry/is-expired"
import { RecencyIndex } from "../../core/recency/recency-index"
import { EntryTable } from "../../core/table/entry-table"
import {
  assertValidIntervalMs,
  isValidCapacity,
  normalizeTtlMs,
} from "../../core/validation/validation"
import type { Cache } from "../../ports/cache"
import { NO_EXPIRY } from "../../ports/cache-entry"
import { type CacheEvictionPolicy, isCacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import { DEFAULT_CLEARING_INTERVAL_MS, type MemoryCacheOptions } from "../../ports/cache-options"
import { type CacheResult, fail, ok } from "../../ports/cache-result"
import type { CacheStats } from "../../ports/cache-stats"
import type { RandomSource } from "../../ports/random-source"

export type MemoryCacheDeps = {
  clock: Clock
  logger: Logger
  random: RandomSource
}

/**
 * In-process cache with a capacity bound, sliding TTLs and a pluggable
 * eviction policy.
 *
 * Every method is synchronous, so each call runs to completion before any
 * other caller (or the background sweep) can observe the cache.
 *
 * @throws {CacheError} `invalid_capacity` or `invalid_policy` for bad options.
 * @throws {RangeError} for a negative or non-finite clearing interval.
 */
export class MemoryCache<K, V> implements Cache<K, V> {
  private readonly table = new EntryTable<K, V>()
  private readonly recency = new RecencyIndex<K>()
  private readonly logger: Logger
  private readonly sweeper: ExpirySweeper
  private readonly clearingIntervalMs: Milliseconds

  private maxEntries: number
  private policy: CacheEvictionPolicy
  private strategy: EvictionStrategy<K>
  private closed = false

  public constructor(
    private readonly deps: MemoryCacheDeps,
    opts: MemoryCacheOptions,
  ) {
    if (!isValidCapacity(opts.capacity)) throw invalidCapacityError(opts.capacity)
    if (!isCacheEvictionPolicy(opts.evictionPolicy)) {
      throw invalidPolicyError(opts.evictionPolicy)
    }
    assertValidIntervalMs(opts.clearingIntervalMs, "clearingIntervalMs")

    this.maxEntries = opts.capacity
    this.policy = opts.evictionPolicy
    this.strategy = createEvictionStrategy(this.policy, { random: deps.random })
    this.clearingIntervalMs =
      opts.clearingIntervalMs === 0 ? DEFAULT_CLEARING_INTERVAL_MS : opts.clearingIntervalMs

    this.logger =
      opts.name === undefined
        ? deps.logger.child({ module: "memory-cache" })
        : deps.logger.child({ module: "memory-cache", cache: opts.name })

    this.sweeper = new ExpirySweeper(
      { clock: deps.clock, logger: this.logger },
      { intervalMs: this.clearingIntervalMs },
      () => this.sweep(),
    )
    this.sweeper.start()

    this.logger.info("memory cache created", {
      capacity: this.maxEntries,
      evictionPolicy: this.policy,
      clearingIntervalMs: this.clearingIntervalMs,
    })
  }

  get(key: K): CacheResult<V, "not_found"> {
    const entry = this.table.lookup(key)
    if (entry === undefined) return fail(notFoundError(key))

    const nowMs = this.deps.clock.nowMs()

    if (isExpired(entry, nowMs)) {
      this.removeEntry(key)
      return fail(notFoundError(key))
    }

    this.table.touch(key, nowMs)
    this.recency.moveToFront(key)

    return ok(entry.value)
  }

  set(key: K, value: V, ttlMs: Milliseconds = NO_EXPIRY): void {
    this.ensureCapacity()

    this.table.insert(key, value, normalizeTtlMs(ttlMs), this.deps.clock.nowMs())
    this.recency.pushFront(key)
  }

  delete(key: K): CacheResult<void, "not_found"> {
    if (!this.removeEntry(key)) return fail(notFoundError(key))

    return ok(undefined)
  }

  clear(): void {
    this.table.clear()
    this.recency.clear()
  }

  keys(): CacheResult<K[], "empty_cache"> {
    if (this.table.size === 0) return fail(emptyCacheError())

    return ok(Array.from(this.table.keys()))
  }

  keysByRecency(): K[] {
    return Array.from(this.recency)
  }

  getAll(): V[] {
    return this.table.values()
  }

  setTtl(key: K, ttlMs: Milliseconds): CacheResult<void, "not_found"> {
    if (!this.table.setTtl(key, normalizeTtlMs(ttlMs))) return fail(notFoundError(key))

    return ok(undefined)
  }

  getTtl(key: K): CacheResult<Milliseconds, "not_found"> {
    const entry = this.table.lookup(key)
    if (entry === undefined) return fail(notFoundError(key))

    return ok(entry.ttlMs)
  }

  getCounter(key: K): CacheResult<number, "not_found"> {
    const entry = this.table.lookup(key)
    if (entry === undefined) return fail(notFoundError(key))

    return ok(entry.accessCount)
  }

  setCapacity(capacity: number): CacheResult<void, "invalid_capacity"> {
    if (!isValidCapacity(capacity)) return fail(invalidCapacityError(capacity))

    this.maxEntries = capacity

    return ok(undefined)
  }

  capacity(): number {
    return this.maxEntries
  }

  setEvictionPolicy(policy: string): CacheResult<void, "invalid_policy"> {
    if (!isCacheEvictionPolicy(policy)) return fail(invalidPolicyError(policy))

    this.policy = policy
    this.strategy = createEvictionStrategy(policy, { random: this.deps.random })

    return ok(undefined)
  }

  evictionPolicy(): CacheEvictionPolicy {
    return this.policy
  }

  size(): number {
    return this.table.size
  }

  stats(): CacheStats<K, V> {
    const size = this.table.size

    return {
      evictionPolicy: this.policy,
      capacity: this.maxEntries,
      clearingIntervalMs: this.clearingIntervalMs,
      size,
      occupancy: this.maxEntries === 0 ? 0 : (100 * size) / this.maxEntries,
      entries: Array.from(this.table.entries(), ([key, entry]) => ({
        key,
        value: entry.value,
        ttlMs: entry.ttlMs,
        accessCount: entry.accessCount,
        lastAccess: new Date(entry.lastAccessMs),
      })),
    }
  }

  sweep(): number {
    const nowMs = this.deps.clock.nowMs()
    const expired: K[] = []

    for (const [key, entry] of this.table.entries()) {
      if (isExpired(entry, nowMs)) expired.push(key)
    }

    for (const key of expired) this.removeEntry(key)

    return expired.length
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await this.sweeper.stop()

    this.logger.info("memory cache closed")
  }

  /** Runs before every insert; an overwritten victim is written back by the caller. */
  private ensureCapacity(): void {
    if (this.maxEntries === 0 || this.table.size < this.maxEntries) return

    const victim = this.strategy.victim({ table: this.table, recency: this.recency })
    if (victim === undefined) return

    this.removeEntry(victim)

    this.logger.debug("entry evicted", { key: victim, policy: this.policy })
  }

  private removeEntry(key: K): boolean {
    this.recency.remove(key)

    return this.table.remove(key)
  }
}
