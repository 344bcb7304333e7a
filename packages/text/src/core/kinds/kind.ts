import type { AnyCheck, CheckResult } from "../../ports/check"
import type { AnyKind, Kind, KindErrorOf } from "../../ports/kind"

export function defineKind<N extends string, C extends AnyCheck>(definition: {
  name: N
  description: string
  check: C
}): Kind<N, C> {
  return Object.freeze({
    name: definition.name,
    description: definition.description,
    check: definition.check,
  })
}

/**
 * Run the kind's check.
 *
 * The check of `K` produces exactly `KindErrorOf<K>`; a generic call erases
 * it to `Error`, so the error type is restored at this boundary.
 */
export function validate<K extends AnyKind>(
  kind: K,
  value: string,
): CheckResult<KindErrorOf<K>> {
  return kind.check.check(value) as CheckResult<KindErrorOf<K>>
}
