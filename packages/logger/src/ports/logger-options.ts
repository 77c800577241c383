import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses the per-operation "debug" lines
   * buckets write on success.
   */
  level: LogLevelName

  /**
   * Human-readable output for local use. Structured JSON otherwise.
   */
  prettify?: boolean
}
