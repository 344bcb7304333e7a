import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"

export class SingleLineError extends CheckError<"single_line"> {
  constructor() {
    super("value is not single-line", { code: "single_line" })
  }
}

/**
 * Rejects any line feed, trailing ones included.
 */
export const SingleLine: Check<SingleLineError, "SingleLine"> = {
  name: "SingleLine",
  check(value) {
    return value.includes("\n") ? err(new SingleLineError()) : passed
  },
}
