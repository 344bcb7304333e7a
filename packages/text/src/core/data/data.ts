import type { MaybeOwned } from "../../ports/maybe-owned"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"
import { borrowed, owned } from "../maybe-owned"
import { fromCow, fromStorage, fromStr, intoString } from "../storage/storage"
import { SmallString } from "./small-string"

export type DataRepr<S> =
  | { readonly type: "static"; readonly value: string }
  | { readonly type: "inline"; readonly value: SmallString }
  | { readonly type: "dynamic"; readonly value: S }

/**
 * The text behind a `Text`: a static string, a small inline buffer, or a
 * handle of the configured dynamic storage.
 *
 * Constructors other than `fromStaticStr`, `fromStaticStrCow` and
 * `fromDynamic` store values of at most 16 UTF-8 bytes inline.
 * `into*`, `convert` and `release` consume the data.
 */
export class Data<S extends DynamicStorage> {
  private constructor(
    readonly strategy: StorageStrategy<S>,
    private readonly repr: DataRepr<S>,
  ) {}

  static fromStaticStr<S extends DynamicStorage>(
    strategy: StorageStrategy<S>,
    value: string,
  ): Data<S> {
    return new Data(strategy, { type: "static", value })
  }

  static fromStr<S extends DynamicStorage>(strategy: StorageStrategy<S>, value: string): Data<S> {
    return Data.inlineOr(strategy, value, () => fromStr(strategy, value))
  }

  static fromString<S extends DynamicStorage>(
    strategy: StorageStrategy<S>,
    value: string,
  ): Data<S> {
    return Data.inlineOr(strategy, value, () => strategy.fromString(value))
  }

  static fromCow<S extends DynamicStorage>(
    strategy: StorageStrategy<S>,
    value: MaybeOwned<string>,
  ): Data<S> {
    return Data.inlineOr(strategy, value.value, () => fromCow(strategy, value))
  }

  /**
   * Borrowed input is kept as static data; owned input is treated like
   * {@link Data.fromString}.
   */
  static fromStaticStrCow<S extends DynamicStorage>(
    strategy: StorageStrategy<S>,
    value: MaybeOwned<string>,
  ): Data<S> {
    return value.type === "borrowed"
      ? Data.fromStaticStr(strategy, value.value)
      : Data.fromString(strategy, value.value)
  }

  static fromDynamic<S extends DynamicStorage>(strategy: StorageStrategy<S>, value: S): Data<S> {
    return new Data(strategy, { type: "dynamic", value })
  }

  private static inlineOr<S extends DynamicStorage>(
    strategy: StorageStrategy<S>,
    value: string,
    dynamic: () => S,
  ): Data<S> {
    const small = SmallString.tryFrom(value)
    if (small) return new Data(strategy, { type: "inline", value: small })

    return new Data(strategy, { type: "dynamic", value: dynamic() })
  }

  get representation(): DataRepr<S>["type"] {
    return this.repr.type
  }

  asStr(): string {
    switch (this.repr.type) {
      case "static":
        return this.repr.value
      case "inline":
        return this.repr.value.asStr()
      case "dynamic":
        return this.repr.value.asStr()
    }
  }

  /**
   * Move to another storage strategy. Only dynamic data is touched.
   */
  convert<S2 extends DynamicStorage>(strategy: StorageStrategy<S2>): Data<S2> {
    if (this.repr.type === "dynamic") {
      return new Data(strategy, { type: "dynamic", value: fromStorage(strategy, this.repr.value) })
    }

    return new Data<S2>(strategy, this.repr)
  }

  intoString(): string {
    return this.repr.type === "dynamic" ? intoString(this.repr.value) : this.asStr()
  }

  intoStaticStrCow(): MaybeOwned<string> {
    return this.repr.type === "static" ? borrowed(this.repr.value) : owned(this.intoString())
  }

  intoDynamic(): S {
    return this.repr.type === "dynamic" ? this.repr.value : fromStr(this.strategy, this.asStr())
  }

  clone(): Data<S> {
    if (this.repr.type === "dynamic") {
      return new Data(this.strategy, { type: "dynamic", value: this.strategy.clone(this.repr.value) })
    }

    return new Data(this.strategy, this.repr)
  }

  release(): void {
    if (this.repr.type === "dynamic") this.repr.value.release()
  }
}
