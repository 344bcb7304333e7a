import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function contextOf(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null ? { ...value } : {}
}

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - BaseError instances keep code, context and operational flag
 * - Standard Error instances get code "unknown"
 * - Non-Error values are wrapped with their value in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: contextOf(err.context),
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
