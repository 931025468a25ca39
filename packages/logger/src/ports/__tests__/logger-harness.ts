import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One emitted line, decoded back from the adapter's JSON output. */
export type CapturedLog = {
  level: LogLevelName
  message: string
  payload: Record<string, unknown>
}

export type CapturingLogger = {
  logger: Logger
  read: () => CapturedLog[]
  clear: () => void
}

export type LoggerHarness = {
  name: string
  make: (opts?: { level?: LogLevelName }) => CapturingLogger
}
