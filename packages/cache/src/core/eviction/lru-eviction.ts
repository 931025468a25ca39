import type { EvictionCandidates, EvictionStrategy } from "./eviction-strategy"

export class LruEviction<K> implements EvictionStrategy<K> {
  readonly policy = "lru"

  victim({ recency }: EvictionCandidates<K>): K | undefined {
    return recency.back()
  }
}
