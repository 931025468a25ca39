import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds. Resolves early if `signal` is aborted.
   *
   * @remarks
   * A pending sleep must not keep the process alive on its own; background
   * loops built on it stop when the process has nothing else to do.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
