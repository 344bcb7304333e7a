import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"

export class NotEmptyError extends CheckError<"not_empty"> {
  constructor() {
    super("value is empty", { code: "not_empty" })
  }
}

export const NotEmpty: Check<NotEmptyError, "NotEmpty"> = {
  name: "NotEmpty",
  check(value) {
    return value.length > 0 ? passed : err(new NotEmptyError())
  },
}
