import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"

const CONTROL_CHAR = /\p{Cc}/gu

export class NoControlError extends CheckError<"no_control"> {
  readonly controlCount: number

  constructor(controlCount: number) {
    super(`value contains ${controlCount} control character(s)`, {
      code: "no_control",
      context: { controlCount },
    })
    this.controlCount = controlCount
  }
}

export const NoControl: Check<NoControlError, "NoControl"> = {
  name: "NoControl",
  check(value) {
    const count = value.match(CONTROL_CHAR)?.length ?? 0

    return count === 0 ? passed : err(new NoControlError(count))
  },
}
