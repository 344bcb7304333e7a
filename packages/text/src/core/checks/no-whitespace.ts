import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"

const WHITESPACE_RUN = /\p{White_Space}+/gu

export class NoWhitespaceError extends CheckError<"no_whitespace"> {
  /** Number of whitespace runs; `"a b  c"` has two */
  readonly whitespaceCount: number

  constructor(whitespaceCount: number) {
    super(
      `value contains whitespace (value contains ${whitespaceCount} whitespace sequence(s))`,
      { code: "no_whitespace", context: { whitespaceCount } },
    )
    this.whitespaceCount = whitespaceCount
  }
}

export const NoWhitespace: Check<NoWhitespaceError, "NoWhitespace"> = {
  name: "NoWhitespace",
  check(value) {
    const count = value.match(WHITESPACE_RUN)?.length ?? 0

    return count === 0 ? passed : err(new NoWhitespaceError(count))
  },
}
