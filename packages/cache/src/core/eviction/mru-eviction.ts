import type { EvictionCandidates, EvictionStrategy } from "./eviction-strategy"

export class MruEviction<K> implements EvictionStrategy<K> {
  readonly policy = "mru"

  victim({ recency }: EvictionCandidates<K>): K | undefined {
    return recency.front()
  }
}
