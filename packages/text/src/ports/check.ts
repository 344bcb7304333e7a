import type { Result } from "./result"

export type CheckResult<E> = Result<void, E>

/**
 * A stateless predicate over a string.
 *
 * @remarks
 * `name` doubles as the check's type-level identity: two checks are
 * considered the same when their names and error types match. Combinators
 * derive their name from their operands, e.g. `And<MaxBytes512, Title>`.
 */
export interface Check<E extends Error = Error, N extends string = string> {
  readonly name: N

  /**
   * Validate `value`. Must be total and pure: rejection is reported through
   * the result, never thrown.
   */
  check(value: string): CheckResult<E>
}

export type AnyCheck = Check<Error, string>

export type CheckErrorOf<C> = C extends Check<infer E extends Error, string> ? E : never
