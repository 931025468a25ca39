import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Longest delay a Node.js timer honors; larger ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS: Milliseconds = 2_147_483_647

/** Wall-clock time and real timers. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  /**
   * Sleeps longer than {@link MAX_TIMER_DELAY_MS} run as a chain of timers.
   * Every timer is unref'd: a sleeping sweep loop never holds the process
   * open on its own.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined

      const cancel = () => {
        clearTimeout(timer)
        resolve()
      }

      const arm = (remaining: Milliseconds) => {
        const delay = Math.min(remaining, MAX_TIMER_DELAY_MS)

        timer = setTimeout(() => {
          if (remaining > delay) {
            arm(remaining - delay)
            return
          }

          signal?.removeEventListener("abort", cancel)
          resolve()
        }, delay)

        timer.unref()
      }

      arm(ms)

      signal?.addEventListener("abort", cancel, { once: true })
    })
  }
}
