import { evictionPolicyName } from "../../ports/cache-eviction-policy"
import type { CacheStats } from "../../ports/cache-stats"
import { formatDuration } from "./format-duration"

/**
 * Render a stats snapshot as a plain-text report, one line per field and one
 * line per entry.
 */
export function formatStats<K, V>(stats: CacheStats<K, V>): string {
  const capacity = stats.capacity === 0 ? "unlimited" : String(stats.capacity)

  let out = "STATS\n"
  out += `Eviction Policy: ${evictionPolicyName(stats.evictionPolicy)}\n`
  out += `Capacity: ${capacity}\n`
  out += `Clearing Interval: ${formatDuration(stats.clearingIntervalMs)}\n`
  out += `Items: ${stats.size}\n`
  out += `Occupancy: ${stats.occupancy.toFixed(2)}%\n`
  out += "Cache:\n"

  for (const entry of stats.entries) {
    out += `  Key: ${String(entry.key)}, Value: ${String(entry.value)}, TTL: ${formatDuration(entry.ttlMs)}, Counter: ${entry.accessCount}, Last Used: ${entry.lastAccess.toISOString()}\n`
  }

  return out
}
