import type { RandomSource } from "../../ports/random-source"
import type { EvictionCandidates, EvictionStrategy } from "./eviction-strategy"

export class RandomEviction<K> implements EvictionStrategy<K> {
  readonly policy = "random"

  constructor(private readonly random: RandomSource) {}

  victim({ table }: EvictionCandidates<K>): K | undefined {
    if (table.size === 0) return undefined

    const target = Math.min(Math.floor(this.random.next() * table.size), table.size - 1)

    let index = 0
    for (const key of table.keys()) {
      if (index === target) return key
      index++
    }

    return undefined
  }
}
