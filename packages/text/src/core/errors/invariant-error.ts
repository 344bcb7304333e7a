import { BaseError, type ErrorContext } from "@textkind/errors"

export type InvariantCode = "invariant_violation" | "text_moved" | "storage_released"

export type InvariantErrorOptions = Readonly<{
  code: InvariantCode
  context?: ErrorContext
  cause?: unknown
}>

/**
 * A broken programming contract. Always thrown, never returned, and never
 * operational.
 */
export class InvariantError extends BaseError<InvariantCode> {
  constructor(message: string, options: InvariantErrorOptions) {
    super(message, { ...options, isOperational: false })
  }
}

export function storageReleased(strategy: string): InvariantError {
  return new InvariantError(`${strategy} storage handle was used after release`, {
    code: "storage_released",
    context: { storage: strategy },
  })
}
