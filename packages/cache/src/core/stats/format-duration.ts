import type { Milliseconds } from "@tidecache/clock"

const MS_PER_SECOND = 1000
const MS_PER_MINUTE = 60 * MS_PER_SECOND
const MS_PER_HOUR = 60 * MS_PER_MINUTE

/**
 * Compact human-readable duration: `"0s"`, `"250ms"`, `"1.5s"`, `"1m40s"`,
 * `"2h0m0s"`. Units of an hour or more always spell out minutes and seconds.
 */
export function formatDuration(ms: Milliseconds): string {
  if (ms === 0) return "0s"
  if (ms < 0) return `-${formatDuration(-ms)}`
  if (ms < MS_PER_SECOND) return `${trimFraction(ms)}ms`

  const hours = Math.floor(ms / MS_PER_HOUR)
  const minutes = Math.floor((ms % MS_PER_HOUR) / MS_PER_MINUTE)
  const seconds = trimFraction((ms % MS_PER_MINUTE) / MS_PER_SECOND)

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`
  if (minutes > 0) return `${minutes}m${seconds}s`

  return `${seconds}s`
}

function trimFraction(value: number): string {
  return String(Number(value.toFixed(3)))
}
