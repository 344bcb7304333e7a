import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"
import { trimWhitespace } from "./chars"

export class WhenTrimmedError<E extends Error> extends CheckError<"when_trimmed"> {
  readonly error: E

  constructor(error: E) {
    super(`${error.message} when trimmed`, { code: "when_trimmed", cause: error })
    this.error = error
  }
}

/**
 * Runs `inner` against the value with surrounding whitespace removed.
 */
export function whenTrimmed<E extends Error, N extends string>(
  inner: Check<E, N>,
): Check<WhenTrimmedError<E>, `WhenTrimmed<${N}>`> {
  return {
    name: `WhenTrimmed<${inner.name}>`,
    check(value) {
      const result = inner.check(trimWhitespace(value))

      return result.success ? passed : err(new WhenTrimmedError(result.error))
    },
  }
}
