import type { AnyCheck, CheckErrorOf } from "./check"

/**
 * Identity of a category of validated text.
 *
 * A kind ties a check to a human readable description. Text values are
 * parameterized by their kind, so a `Text<typeof Title, S>` can never be
 * passed where a `Text<typeof Identifier, S>` is expected.
 */
export interface Kind<N extends string = string, C extends AnyCheck = AnyCheck> {
  /** Unique kind name, e.g. "Title" */
  readonly name: N

  /** Used in error messages: "invalid <description>" */
  readonly description: string

  readonly check: C
}

export type AnyKind = Kind<string, AnyCheck>

export type CheckOf<K extends AnyKind> = K["check"]

export type KindErrorOf<K extends AnyKind> = CheckErrorOf<K["check"]>

/**
 * Resolves to `unknown` when both kinds carry the same check type, `never`
 * otherwise. Intersected with a parameter to reject transitions between
 * kinds whose checks differ.
 */
export type SameCheck<A extends AnyKind, B extends AnyKind> = [CheckOf<A>] extends [
  CheckOf<B>,
]
  ? [CheckOf<B>] extends [CheckOf<A>]
    ? unknown
    : never
  : never
