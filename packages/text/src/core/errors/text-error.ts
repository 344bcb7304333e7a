import { BaseError } from "@textkind/errors"
import type { AnyKind, KindErrorOf } from "../../ports/kind"
import { valuesEqual } from "./check-error"

/**
 * A value was rejected by the check of kind `K`.
 *
 * The message is always `invalid <description>`; the check error is kept as
 * `error` (and `cause`) for callers that need the detail.
 */
export class TextError<K extends AnyKind> extends BaseError<"invalid_text"> {
  readonly kind: K
  readonly error: KindErrorOf<K>

  constructor(kind: K, error: KindErrorOf<K>) {
    super(`invalid ${kind.description}`, {
      code: "invalid_text",
      context: { kind: kind.name, check: kind.check.name },
      cause: error,
    })
    this.kind = kind
    this.error = error
  }

  withValue<V>(value: V): TextErrorWithValue<K, V> {
    return new TextErrorWithValue(this.kind, this.error, value)
  }

  equals(other: TextError<AnyKind>): boolean {
    return other.kind === this.kind && valuesEqual(this.error, other.error)
  }
}

/**
 * A {@link TextError} that hands the rejected input back to the caller.
 */
export class TextErrorWithValue<K extends AnyKind, V> extends TextError<K> {
  readonly value: V

  constructor(kind: K, error: KindErrorOf<K>, value: V) {
    super(kind, error)
    this.value = value
  }

  withoutValue(): TextError<K> {
    return new TextError(this.kind, this.error)
  }

  split(): [TextError<K>, V] {
    return [this.withoutValue(), this.value]
  }

  mapValue<W>(fn: (value: V) => W): TextErrorWithValue<K, W> {
    return new TextErrorWithValue(this.kind, this.error, fn(this.value))
  }

  override equals(other: TextError<AnyKind>): boolean {
    return (
      super.equals(other) &&
      other instanceof TextErrorWithValue &&
      valuesEqual(this.value, other.value)
    )
  }
}
