import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where logs are ingested
   * as JSON.
   */
  prettify?: boolean
}
