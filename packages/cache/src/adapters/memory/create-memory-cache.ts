import { SystemClock } from "@tidecache/clock"
import { NullLogger } from "@tidecache/logger"
import type { MemoryCacheOptions } from "../../ports/cache-options"
import { systemRandom } from "../random/system-random"
import { MemoryCache, type MemoryCacheDeps } from "./memory-cache"

/**
 * Build a cache on the system clock, with logging off and `Math.random` for
 * random eviction, unless `deps` says otherwise.
 */
export function createMemoryCache<K, V>(
  opts: Partial<MemoryCacheOptions> = {},
  deps: Partial<MemoryCacheDeps> = {},
): MemoryCache<K, V> {
  return new MemoryCache<K, V>(
    {
      clock: deps.clock ?? new SystemClock(),
      logger: deps.logger ?? new NullLogger(),
      random: deps.random ?? systemRandom,
    },
    {
      capacity: opts.capacity ?? 0,
      clearingIntervalMs: opts.clearingIntervalMs ?? 0,
      evictionPolicy: opts.evictionPolicy ?? "lru",
      name: opts.name,
    },
  )
}
