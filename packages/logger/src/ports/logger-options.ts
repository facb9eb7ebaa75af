import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define policy: which levels are emitted and whether output
 * is rendered for humans or for log processors. Adapters decide how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development. Leave off in production,
   * where structured JSON lines are expected.
   */
  prettify?: boolean
}
