import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   * Intended for local development; keep JSON output in production.
   */
  prettify?: boolean
}
