import type { AnyKind } from "../../ports/kind"
import type { MaybeOwned } from "../../ports/maybe-owned"
import type { Result } from "../../ports/result"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"
import type { Data } from "../data/data"
import type { TextError, TextErrorWithValue } from "../errors/text-error"
import { validate } from "../kinds/kind"
import { Text } from "./text"

/**
 * Constructors for one kind under one storage strategy.
 *
 * @example
 * ```ts
 * const TitleText = defineText(Title, shared)
 *
 * const title = TitleText.parse("Release notes")
 * TitleText.is(title) // true
 * ```
 */
export interface TextFactory<K extends AnyKind, S extends DynamicStorage> {
  readonly kind: K
  readonly strategy: StorageStrategy<S>

  tryFromStaticStr(value: string): Result<Text<K, S>, TextError<K>>
  tryFromStr(value: string): Result<Text<K, S>, TextError<K>>
  tryFromStrCow(
    value: MaybeOwned<string>,
  ): Result<Text<K, S>, TextErrorWithValue<K, MaybeOwned<string>>>
  tryFromStaticStrCow(
    value: MaybeOwned<string>,
  ): Result<Text<K, S>, TextErrorWithValue<K, MaybeOwned<string>>>
  tryFromString(value: string): Result<Text<K, S>, TextErrorWithValue<K, string>>
  tryFromDynamic(value: S): Result<Text<K, S>, TextErrorWithValue<K, S>>
  tryFromData(value: Data<S>): Result<Text<K, S>, TextErrorWithValue<K, Data<S>>>

  /**
   * @throws TextError when the kind's check rejects `value`
   */
  parse(value: string): Text<K, S>

  /** Type guard for texts of this kind and strategy */
  is(value: unknown): value is Text<K, S>

  /** Whether the kind's check accepts `value` */
  accepts(value: string): boolean

  withStorage<S2 extends DynamicStorage>(strategy: StorageStrategy<S2>): TextFactory<K, S2>
}

export function defineText<K extends AnyKind, S extends DynamicStorage>(
  kind: K,
  strategy: StorageStrategy<S>,
): TextFactory<K, S> {
  return {
    kind,
    strategy,
    tryFromStaticStr: (value) => Text.tryFromStaticStr(kind, strategy, value),
    tryFromStr: (value) => Text.tryFromStr(kind, strategy, value),
    tryFromStrCow: (value) => Text.tryFromStrCow(kind, strategy, value),
    tryFromStaticStrCow: (value) => Text.tryFromStaticStrCow(kind, strategy, value),
    tryFromString: (value) => Text.tryFromString(kind, strategy, value),
    tryFromDynamic: (value) => Text.tryFromDynamic(kind, strategy, value),
    tryFromData: (value) => Text.tryFromData(kind, value),
    parse(value) {
      const result = Text.tryFromStr(kind, strategy, value)
      if (!result.success) throw result.error

      return result.value
    },
    is: (value): value is Text<K, S> =>
      value instanceof Text && value.kind === kind && value.strategy === strategy,
    accepts: (value) => validate(kind, value).success,
    withStorage: (other) => defineText(kind, other),
  }
}
