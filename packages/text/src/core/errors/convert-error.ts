import { BaseError } from "@textkind/errors"
import type { AnyKind } from "../../ports/kind"
import type { DynamicStorage } from "../../ports/storage"
import type { Text } from "../text/text"
import type { TextError, TextErrorWithValue } from "./text-error"

/**
 * A failed conversion of a `Text<SK, S>`, bundling the failure with the
 * untouched source text.
 */
export class ConvertError<
  SK extends AnyKind,
  S extends DynamicStorage,
  E extends Error,
> extends BaseError<"conversion_failed"> {
  readonly error: E
  readonly text: Text<SK, S>

  constructor(error: E, text: Text<SK, S>) {
    super(error.message, {
      code: "conversion_failed",
      context: { source: text.kind.name },
      cause: error,
    })
    this.error = error
    this.text = text
  }

  static fromErrorWithValue<TK extends AnyKind, SK extends AnyKind, S extends DynamicStorage>(
    error: TextErrorWithValue<TK, Text<SK, S>>,
  ): ConvertError<SK, S, TextError<TK>> {
    const [inner, text] = error.split()

    return new ConvertError(inner, text)
  }

  intoErrorWithValue<TK extends AnyKind>(
    this: ConvertError<SK, S, TextError<TK>>,
  ): TextErrorWithValue<TK, Text<SK, S>> {
    return this.error.withValue(this.text)
  }
}
