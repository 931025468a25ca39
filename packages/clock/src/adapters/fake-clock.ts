import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAtMs: Milliseconds
  resolve: () => void
}

/**
 * Manually driven clock for tests.
 *
 * `sleep()` parks the caller until `advance()` or `set()` moves time past its
 * wake-up point, or until its signal aborts. Nothing runs on real timers.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private sleepers: PendingSleep[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms
    this.wakeDueSleepers()
  }

  /** Number of sleeps still waiting for time to move. */
  pendingSleeps(): number {
    return this.sleepers.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const sleeper: PendingSleep = {
        wakeAtMs: this.time + ms,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.sleepers = this.sleepers.filter((s) => s !== sleeper)
        resolve()
      }

      this.sleepers.push(sleeper)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private wakeDueSleepers(): void {
    const due = this.sleepers.filter((s) => s.wakeAtMs <= this.time)
    if (due.length === 0) return

    this.sleepers = this.sleepers.filter((s) => s.wakeAtMs > this.time)

    for (const sleeper of due) sleeper.resolve()
  }
}
