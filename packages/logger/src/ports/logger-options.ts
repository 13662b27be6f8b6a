import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Structured JSON
   * otherwise.
   */
  prettify?: boolean
}
