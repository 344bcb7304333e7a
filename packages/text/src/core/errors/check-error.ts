import { isDeepStrictEqual } from "node:util"
import { BaseError, type ErrorCode } from "@textkind/errors"

/**
 * Base class for errors returned by checks.
 *
 * Detail lives in `context`; combinator errors keep the inner error as
 * `cause`. Two check errors are equal when they have the same class, code,
 * context and (recursively) cause.
 */
export class CheckError<C extends ErrorCode = ErrorCode> extends BaseError<C> {
  equals(other: unknown): boolean {
    if (!(other instanceof CheckError)) return false
    if (other.constructor !== this.constructor || other.code !== this.code) return false
    if (!isDeepStrictEqual(this.context, other.context)) return false

    return valuesEqual(this.cause, other.cause)
  }
}

function isTextLike(value: unknown): value is { asStr(): string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "asStr" in value &&
    typeof value.asStr === "function"
  )
}

/**
 * Structural equality used by the error model.
 *
 * Check errors compare with `equals`, anything exposing `asStr()` (texts,
 * data, storage handles) by content, everything else deeply.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof CheckError) return a.equals(b)
  if (isTextLike(a) && isTextLike(b)) return a.asStr() === b.asStr()

  return isDeepStrictEqual(a, b)
}
