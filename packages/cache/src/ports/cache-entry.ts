import type { Milliseconds } from "@tidecache/clock"

/** Time-to-live meaning "never expires". */
export const NO_EXPIRY: Milliseconds = 0

/**
 * Bookkeeping kept for every live key.
 *
 * The TTL is sliding: an entry expires once `lastAccessMs + ttlMs` lies in
 * the past, and every successful read moves `lastAccessMs` forward.
 */
export type CacheEntry<V> = {
  value: V

  /** 0 means the entry never expires. */
  ttlMs: Milliseconds

  /** Starts at 1 on write and grows by one per successful read. */
  accessCount: number

  lastAccessMs: Milliseconds
}
