import { BaseError } from "@textkind/errors"
import type { AnyKind, TextError } from "@textkind/text"

export type DeserializeErrorCode = "invalid_json" | "invalid_json_type" | "invalid_text"

export class DeserializeError extends BaseError<DeserializeErrorCode> {}

/**
 * `invalid <description> because <check message>`
 */
export function describeTextError(error: TextError<AnyKind>): string {
  return `${error.message} because ${error.error.message}`
}

export function describeJsonType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "an array"

  switch (typeof value) {
    case "object":
      return "an object"
    case "number":
      return `number ${value}`
    case "boolean":
      return `boolean ${value}`
    default:
      return typeof value
  }
}
