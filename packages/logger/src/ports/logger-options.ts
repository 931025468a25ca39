import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Concrete adapters (console,
 * pino) must honor them but are free to implement them as they like.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below this level are ignored.
   *
   * Example: "info" suppresses the per-eviction "debug" entries of a cache.
   */
  level: LogLevelName

  /**
   * Pretty-print output for humans instead of one JSON object per line.
   *
   * @remarks
   * Meant for local development; keep it off where logs are ingested by a
   * log processor.
   */
  prettify?: boolean
}
