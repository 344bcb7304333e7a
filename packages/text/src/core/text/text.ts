import type { AnyKind, SameCheck } from "../../ports/kind"
import type { MaybeOwned } from "../../ports/maybe-owned"
import type { Result } from "../../ports/result"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"
import type { Converter, TryConverter } from "../conversion/converter"
import type { ConvertError } from "../errors/convert-error"
import { InvariantError } from "../errors/invariant-error"
import { TextError, type TextErrorWithValue } from "../errors/text-error"
import { Data } from "../data/data"
import { validate } from "../kinds/kind"
import { err, ok } from "../result"

/**
 * Anything with a string view; accepted wherever texts are compared.
 */
export interface TextLike {
  asStr(): string
}

/**
 * A string that satisfies the check of kind `K` for as long as it lives,
 * held in storage of type `S`.
 *
 * @remarks
 * Texts are immutable. Consuming operations (`into*`, transitions,
 * conversions and `release`) move the data out; using a moved text throws an
 * `InvariantError` with code `text_moved`. Failed transitions and
 * conversions leave the source untouched.
 *
 * @example
 * ```ts
 * const result = Text.tryFromStr(Title, exclusive, "Quarterly report")
 *
 * if (result.success) {
 *   result.value.asStr() // "Quarterly report"
 * } else {
 *   result.error.message // "invalid title"
 * }
 * ```
 */
export class Text<K extends AnyKind, S extends DynamicStorage> implements TextLike {
  private data: Data<S> | undefined

  private constructor(
    readonly kind: K,
    readonly strategy: StorageStrategy<S>,
    data: Data<S>,
  ) {
    this.data = data
  }

  /**
   * Keep `value` as static data. Nothing is copied; on rejection there is
   * nothing to hand back.
   */
  static tryFromStaticStr<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    strategy: StorageStrategy<S>,
    value: string,
  ): Result<Text<K, S>, TextError<K>> {
    const checked = validate(kind, value)
    if (!checked.success) return err(new TextError(kind, checked.error))

    return ok(new Text(kind, strategy, Data.fromStaticStr(strategy, value)))
  }

  /**
   * Copy `value` into fresh storage: inline up to 16 bytes, dynamic beyond.
   */
  static tryFromStr<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    strategy: StorageStrategy<S>,
    value: string,
  ): Result<Text<K, S>, TextError<K>> {
    const checked = validate(kind, value)
    if (!checked.success) return err(new TextError(kind, checked.error))

    return ok(new Text(kind, strategy, Data.fromStr(strategy, value)))
  }

  static tryFromStrCow<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    strategy: StorageStrategy<S>,
    value: MaybeOwned<string>,
  ): Result<Text<K, S>, TextErrorWithValue<K, MaybeOwned<string>>> {
    const checked = validate(kind, value.value)
    if (!checked.success) return err(new TextError(kind, checked.error).withValue(value))

    return ok(new Text(kind, strategy, Data.fromCow(strategy, value)))
  }

  /**
   * Like {@link Text.tryFromStrCow}, but borrowed input is kept as static
   * data.
   */
  static tryFromStaticStrCow<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    strategy: StorageStrategy<S>,
    value: MaybeOwned<string>,
  ): Result<Text<K, S>, TextErrorWithValue<K, MaybeOwned<string>>> {
    const checked = validate(kind, value.value)
    if (!checked.success) return err(new TextError(kind, checked.error).withValue(value))

    return ok(new Text(kind, strategy, Data.fromStaticStrCow(strategy, value)))
  }

  static tryFromString<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    strategy: StorageStrategy<S>,
    value: string,
  ): Result<Text<K, S>, TextErrorWithValue<K, string>> {
    const checked = validate(kind, value)
    if (!checked.success) return err(new TextError(kind, checked.error).withValue(value))

    return ok(new Text(kind, strategy, Data.fromString(strategy, value)))
  }

  /**
   * Adopt an existing storage handle as-is. On rejection the handle is
   * returned in the error, still usable.
   */
  static tryFromDynamic<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    strategy: StorageStrategy<S>,
    value: S,
  ): Result<Text<K, S>, TextErrorWithValue<K, S>> {
    const checked = validate(kind, value.asStr())
    if (!checked.success) return err(new TextError(kind, checked.error).withValue(value))

    return ok(new Text(kind, strategy, Data.fromDynamic(strategy, value)))
  }

  static tryFromData<K extends AnyKind, S extends DynamicStorage>(
    kind: K,
    value: Data<S>,
  ): Result<Text<K, S>, TextErrorWithValue<K, Data<S>>> {
    const checked = validate(kind, value.asStr())
    if (!checked.success) return err(new TextError(kind, checked.error).withValue(value))

    return ok(new Text(kind, value.strategy, value))
  }

  get isMoved(): boolean {
    return this.data === undefined
  }

  asStr(): string {
    return this.live().asStr()
  }

  toString(): string {
    return this.asStr()
  }

  toJSON(): string {
    return this.asStr()
  }

  equals(other: TextLike | string): boolean {
    return this.asStr() === (typeof other === "string" ? other : other.asStr())
  }

  compare(other: TextLike | string): -1 | 0 | 1 {
    const a = this.asStr()
    const b = typeof other === "string" ? other : other.asStr()

    if (a === b) return 0
    return a < b ? -1 : 1
  }

  clone(): Text<K, S> {
    return new Text(this.kind, this.strategy, this.live().clone())
  }

  intoString(): string {
    return this.take().intoString()
  }

  intoStaticStrCow(): MaybeOwned<string> {
    return this.take().intoStaticStrCow()
  }

  intoDynamic(): S {
    return this.take().intoDynamic()
  }

  intoData(): Data<S> {
    return this.take()
  }

  /**
   * Drop the text, releasing its storage handle.
   */
  release(): void {
    this.take().release()
  }

  /**
   * Relabel as `target`, whose check must be the same type as this kind's.
   *
   * The compiler enforces check equality; the value is validated once more
   * at runtime, and a failure there throws an `InvariantError`.
   */
  kindTransition<K2 extends AnyKind>(target: K2 & SameCheck<K, K2>): Text<K2, S> {
    const checked = validate(target, this.live().asStr())

    if (!checked.success) {
      throw new InvariantError(
        `${this.kind.name} and ${target.name} share a check type but disagree on a value`,
        {
          code: "invariant_violation",
          context: { source: this.kind.name, target: target.name },
          cause: checked.error,
        },
      )
    }

    return new Text<K2, S>(target, this.strategy, this.take())
  }

  /**
   * Re-validate against `target`. On failure the error carries this text,
   * which is left untouched.
   */
  tryKindTransition<K2 extends AnyKind>(
    target: K2,
  ): Result<Text<K2, S>, TextErrorWithValue<K2, Text<K, S>>> {
    const checked = validate(target, this.live().asStr())

    if (!checked.success) {
      return err(new TextError(target, checked.error).withValue<Text<K, S>>(this))
    }

    return ok(new Text(target, this.strategy, this.take()))
  }

  /**
   * Move to another storage strategy. Never re-validates; static and inline
   * data pass through unchanged.
   */
  storageTransition<S2 extends DynamicStorage>(strategy: StorageStrategy<S2>): Text<K, S2> {
    return new Text(this.kind, strategy, this.take().convert(strategy))
  }

  convertInto<K2 extends AnyKind>(converter: Converter<K, K2>): Text<K2, S> {
    return converter.convert<S>(this)
  }

  tryConvertInto<K2 extends AnyKind, E extends Error>(
    converter: TryConverter<K, K2, E>,
  ): Result<Text<K2, S>, ConvertError<K, S, E>> {
    return converter.tryConvert<S>(this)
  }

  private live(): Data<S> {
    if (this.data === undefined) {
      throw new InvariantError(`${this.kind.description} text was used after being moved`, {
        code: "text_moved",
        context: { kind: this.kind.name },
      })
    }

    return this.data
  }

  private take(): Data<S> {
    const data = this.live()
    this.data = undefined

    return data
  }
}
