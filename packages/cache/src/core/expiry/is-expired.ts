import type { Milliseconds } from "@tidecache/clock"
import { type CacheEntry, NO_EXPIRY } from "../../ports/cache-entry"

/**
 * Sliding-TTL check shared by the sweeper and lazy reads. An entry is still
 * live at exactly `lastAccessMs + ttlMs`.
 */
export function isExpired(
  entry: Pick<CacheEntry<unknown>, "ttlMs" | "lastAccessMs">,
  nowMs: Milliseconds,
): boolean {
  if (entry.ttlMs === NO_EXPIRY) return false

  return entry.lastAccessMs + entry.ttlMs < nowMs
}
