import type { AnyKind } from "../../ports/kind"
import type { Result } from "../../ports/result"
import type { DynamicStorage } from "../../ports/storage"
import { ConvertError } from "../errors/convert-error"
import { InvariantError } from "../errors/invariant-error"
import type { TextError } from "../errors/text-error"
import type { Text } from "../text/text"
import { err } from "../result"

/**
 * Infallible conversion between two kinds, for targets whose check accepts
 * everything the source's check accepts.
 */
export interface Converter<SK extends AnyKind, TK extends AnyKind> {
  readonly source: SK
  readonly target: TK

  /**
   * @throws InvariantError when the target rejects the text, i.e. the
   * converter's superset promise does not hold.
   */
  convert<S extends DynamicStorage>(text: Text<SK, S>): Text<TK, S>
}

/**
 * Fallible conversion between two kinds. A failure hands the source text
 * back inside a {@link ConvertError} whose inner error is `E`.
 */
export interface TryConverter<
  SK extends AnyKind,
  TK extends AnyKind,
  E extends Error = TextError<TK>,
> {
  readonly source: SK
  readonly target: TK

  tryConvert<S extends DynamicStorage>(
    text: Text<SK, S>,
  ): Result<Text<TK, S>, ConvertError<SK, S, E>>
}

export function defineConverter<SK extends AnyKind, TK extends AnyKind>(
  source: SK,
  target: TK,
): Converter<SK, TK> {
  return {
    source,
    target,
    convert<S extends DynamicStorage>(text: Text<SK, S>): Text<TK, S> {
      const converted = text.tryKindTransition(target)
      if (converted.success) return converted.value

      throw new InvariantError(
        `converting ${source.name} to ${target.name} produced an ${converted.error.message}`,
        {
          code: "invariant_violation",
          context: { source: source.name, target: target.name },
          cause: converted.error.withoutValue(),
        },
      )
    },
  }
}

export function defineTryConverter<SK extends AnyKind, TK extends AnyKind>(
  source: SK,
  target: TK,
): TryConverter<SK, TK> {
  return {
    source,
    target,
    tryConvert<S extends DynamicStorage>(
      text: Text<SK, S>,
    ): Result<Text<TK, S>, ConvertError<SK, S, TextError<TK>>> {
      const converted = text.tryKindTransition(target)
      if (converted.success) return converted

      return err(ConvertError.fromErrorWithValue(converted.error))
    },
  }
}
