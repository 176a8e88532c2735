import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by all adapters.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
