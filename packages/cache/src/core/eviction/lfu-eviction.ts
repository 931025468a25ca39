import type { EvictionCandidates, EvictionStrategy } from "./eviction-strategy"

/**
 * Full scan for the lowest access counter. The first entry met in table
 * order wins a tie.
 */
export class LfuEviction<K> implements EvictionStrategy<K> {
  readonly policy = "lfu"

  victim({ table }: EvictionCandidates<K>): K | undefined {
    let victim: K | undefined
    let minCount = Number.POSITIVE_INFINITY

    for (const [key, entry] of table.entries()) {
      if (entry.accessCount < minCount) {
        victim = key
        minCount = entry.accessCount
      }
    }

    return victim
  }
}
