import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { RecencyView } from "../recency/recency-index"
import type { EntryTableView } from "../table/entry-table"

/**
 * Everything a strategy may look at when picking a victim.
 */
export type EvictionCandidates<K> = {
  table: EntryTableView<K>
  recency: RecencyView<K>
}

/**
 * Pure victim selection for one eviction policy.
 *
 * Implementations never mutate the structures they are given; the cache
 * removes the returned key from both of them.
 */
export interface EvictionStrategy<K> {
  readonly policy: CacheEvictionPolicy

  /**
   * Return the key that should be evicted next, or `undefined` if there is
   * nothing to evict.
   */
  victim(candidates: EvictionCandidates<K>): K | undefined
}
