import type { Check } from "../../ports/check"
import { and, type AndError } from "./and"
import { NoControl, type NoControlError } from "./no-control"
import { NotEmpty, type NotEmptyError } from "./not-empty"
import { Trimmed, type TrimmedError } from "./trimmed"

export type TitleError = AndError<NotEmptyError, AndError<NoControlError, TrimmedError>>

const titleContent = and(NotEmpty, and(NoControl, Trimmed))

/**
 * Non-empty, free of control characters, and trimmed.
 */
export const TitleCheck: Check<TitleError, "Title"> = {
  name: "Title",
  check: (value) => titleContent.check(value),
}
