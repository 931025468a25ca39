import type { Milliseconds } from "@tidecache/clock"
import { NO_EXPIRY } from "../../ports/cache-entry"

export function isValidCapacity(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

export function assertValidIntervalMs(value: Milliseconds, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative finite number, got: ${value}`)
  }
}

/** Non-finite TTLs never expire. Negative ones pass through: already expired. */
export function normalizeTtlMs(ttlMs: Milliseconds): Milliseconds {
  return Number.isFinite(ttlMs) ? ttlMs : NO_EXPIRY
}
