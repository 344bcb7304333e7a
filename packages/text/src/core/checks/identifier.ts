import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"
import { escapeChar } from "./chars"
import { NotEmpty, type NotEmptyError } from "./not-empty"

const START_CHAR = /^[A-Za-z_]$/
const REST_CHAR = /^[A-Za-z0-9_]$/
const LAX_CHAR = /^[A-Za-z0-9_-]$/

export type IdentifierReason =
  | { readonly type: "empty"; readonly error: NotEmptyError }
  | { readonly type: "invalid_start_char"; readonly char: string }
  | { readonly type: "invalid_rest_char"; readonly char: string }

function identifierMessage(reason: IdentifierReason): string {
  switch (reason.type) {
    case "empty":
      return reason.error.message
    case "invalid_start_char":
      return `value begins with invalid character \`${escapeChar(reason.char)}\``
    case "invalid_rest_char":
      return `value contains invalid character \`${escapeChar(reason.char)}\``
  }
}

export class IdentifierError extends CheckError<"identifier"> {
  readonly reason: IdentifierReason

  constructor(reason: IdentifierReason) {
    super(identifierMessage(reason), {
      code: "identifier",
      context:
        reason.type === "empty"
          ? { reason: reason.type }
          : { reason: reason.type, char: reason.char },
      cause: reason.type === "empty" ? reason.error : undefined,
    })
    this.reason = reason
  }
}

/**
 * ASCII identifier: a letter or underscore, then letters, digits or
 * underscores.
 */
export const IdentifierCheck: Check<IdentifierError, "Identifier"> = {
  name: "Identifier",
  check(value) {
    const empty = NotEmpty.check(value)
    if (!empty.success) return err(new IdentifierError({ type: "empty", error: empty.error }))

    let first = true
    for (const char of value) {
      if (first && !START_CHAR.test(char)) {
        return err(new IdentifierError({ type: "invalid_start_char", char }))
      }
      if (!first && !REST_CHAR.test(char)) {
        return err(new IdentifierError({ type: "invalid_rest_char", char }))
      }
      first = false
    }

    return passed
  },
}

export type IdentifierLaxReason =
  | { readonly type: "empty"; readonly error: NotEmptyError }
  | { readonly type: "invalid_char"; readonly char: string }

export class IdentifierLaxError extends CheckError<"identifier_lax"> {
  readonly reason: IdentifierLaxReason

  constructor(reason: IdentifierLaxReason) {
    super(
      reason.type === "empty"
        ? reason.error.message
        : `value contains invalid character \`${escapeChar(reason.char)}\``,
      {
        code: "identifier_lax",
        context:
          reason.type === "empty"
            ? { reason: reason.type }
            : { reason: reason.type, char: reason.char },
        cause: reason.type === "empty" ? reason.error : undefined,
      },
    )
    this.reason = reason
  }
}

/**
 * Like {@link IdentifierCheck}, but any position may hold a digit or a dash.
 */
export const IdentifierLaxCheck: Check<IdentifierLaxError, "IdentifierLax"> = {
  name: "IdentifierLax",
  check(value) {
    const empty = NotEmpty.check(value)
    if (!empty.success) {
      return err(new IdentifierLaxError({ type: "empty", error: empty.error }))
    }

    for (const char of value) {
      if (!LAX_CHAR.test(char)) {
        return err(new IdentifierLaxError({ type: "invalid_char", char }))
      }
    }

    return passed
  },
}
