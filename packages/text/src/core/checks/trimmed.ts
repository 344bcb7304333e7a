import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"
import { hasLeadingWhitespace, hasTrailingWhitespace, isOnlyWhitespace } from "./chars"

export class TrimmedLeftError extends CheckError<"trimmed_left"> {
  constructor() {
    super("value has whitespace at the beginning", { code: "trimmed_left" })
  }
}

export class TrimmedRightError extends CheckError<"trimmed_right"> {
  constructor() {
    super("value has whitespace at the end", { code: "trimmed_right" })
  }
}

export class TrimmedBothError extends CheckError<"trimmed_both"> {
  constructor() {
    super("value has whitespace at beginning and end", { code: "trimmed_both" })
  }
}

export class TrimmedOnlyError extends CheckError<"trimmed_only"> {
  constructor() {
    super("value contains only whitespace characters", { code: "trimmed_only" })
  }
}

export type TrimmedFailure =
  | { readonly side: "left"; readonly error: TrimmedLeftError }
  | { readonly side: "right"; readonly error: TrimmedRightError }
  | { readonly side: "both"; readonly error: TrimmedBothError }
  | { readonly side: "only"; readonly error: TrimmedOnlyError }

export class TrimmedError extends CheckError<"trimmed"> {
  readonly failure: TrimmedFailure

  constructor(failure: TrimmedFailure) {
    super(failure.error.message, {
      code: "trimmed",
      context: { side: failure.side },
      cause: failure.error,
    })
    this.failure = failure
  }

  get side(): TrimmedFailure["side"] {
    return this.failure.side
  }
}

export const TrimmedLeft: Check<TrimmedLeftError, "TrimmedLeft"> = {
  name: "TrimmedLeft",
  check(value) {
    return hasLeadingWhitespace(value) ? err(new TrimmedLeftError()) : passed
  },
}

export const TrimmedRight: Check<TrimmedRightError, "TrimmedRight"> = {
  name: "TrimmedRight",
  check(value) {
    return hasTrailingWhitespace(value) ? err(new TrimmedRightError()) : passed
  },
}

/**
 * No leading and no trailing whitespace.
 *
 * A non-empty value made only of whitespace reports `only`, never a side.
 */
export const Trimmed: Check<TrimmedError, "Trimmed"> = {
  name: "Trimmed",
  check(value) {
    if (isOnlyWhitespace(value)) {
      return err(new TrimmedError({ side: "only", error: new TrimmedOnlyError() }))
    }

    const left = TrimmedLeft.check(value)
    const right = TrimmedRight.check(value)

    if (!left.success && !right.success) {
      return err(new TrimmedError({ side: "both", error: new TrimmedBothError() }))
    }
    if (!left.success) return err(new TrimmedError({ side: "left", error: left.error }))
    if (!right.success) return err(new TrimmedError({ side: "right", error: right.error }))

    return passed
  },
}
