import type { Milliseconds, Sleeper } from "@tidecache/clock"
import { toAppError } from "@tidecache/errors"
import type { Logger } from "@tidecache/logger"

export type ExpirySweeperDeps = {
  clock: Sleeper
  logger: Logger
}

export type ExpirySweeperOptions = {
  intervalMs: Milliseconds
}

/** Removes every expired entry and returns how many were removed. */
export type SweepFn = () => number

/**
 * Background loop that runs `sweep` once per interval until stopped.
 *
 * Single use: once stopped it cannot be restarted. The loop checks the abort
 * signal after each wake-up, so no sweep starts once `stop()` was called.
 */
export class ExpirySweeper {
  private readonly controller = new AbortController()
  private loop: Promise<void> | undefined

  constructor(
    private readonly deps: ExpirySweeperDeps,
    private readonly opts: ExpirySweeperOptions,
    private readonly sweep: SweepFn,
  ) {
    if (!Number.isFinite(opts.intervalMs) || opts.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be a positive finite number, got: ${opts.intervalMs}`)
    }
  }

  get running(): boolean {
    return this.loop !== undefined && !this.controller.signal.aborted
  }

  start(): void {
    if (this.loop || this.controller.signal.aborted) return

    this.loop = this.run(this.controller.signal)
  }

  /** Resolves once the loop has exited. Safe to call more than once. */
  async stop(): Promise<void> {
    this.controller.abort()

    await this.loop
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.deps.clock.sleep(this.opts.intervalMs, signal)

      if (signal.aborted) return

      this.tick()
    }
  }

  private tick(): void {
    try {
      const removed = this.sweep()

      if (removed > 0) {
        this.deps.logger.debug("expired entries swept", { removed })
      }
    } catch (err) {
      this.deps.logger.error("expiry sweep failed", {
        err: toAppError(err, "sweep_failed"),
      })
    }
  }
}
