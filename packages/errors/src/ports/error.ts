export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Carries structured diagnostic detail (counts, offending characters, limits)
 * so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for diagnostics */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational errors (`true`): rejected input, malformed payloads.
   * - Non-operational errors (`false`): use of a moved value, a broken
   *   conversion promise, a released storage handle.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
