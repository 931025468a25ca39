import { systemRandom } from "../../adapters/random/system-random"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { RandomSource } from "../../ports/random-source"
import type { EvictionStrategy } from "./eviction-strategy"
import { LfuEviction } from "./lfu-eviction"
import { LruEviction } from "./lru-eviction"
import { MruEviction } from "./mru-eviction"
import { RandomEviction } from "./random-eviction"

export type EvictionStrategyDeps = {
  random: RandomSource
}

export function createEvictionStrategy<K>(
  policy: CacheEvictionPolicy,
  deps: EvictionStrategyDeps = { random: systemRandom },
): EvictionStrategy<K> {
  switch (policy) {
    case "lru":
      return new LruEviction<K>()
    case "mru":
      return new MruEviction<K>()
    case "lfu":
      return new LfuEviction<K>()
    case "random":
      return new RandomEviction<K>(deps.random)
  }
}
