import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every logger adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Structured JSON is
   * written otherwise.
   */
  prettify?: boolean
}
