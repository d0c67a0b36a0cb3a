import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance. Adapters decide how to honour it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local work. Leave off in production, where
   * line-delimited JSON is expected.
   */
  prettify?: boolean
}
