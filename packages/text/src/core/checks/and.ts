import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"

export type AndBranch<E1, E2> =
  | { readonly tag: "err1"; readonly error: E1 }
  | { readonly tag: "err2"; readonly error: E2 }

export class AndError<E1 extends Error, E2 extends Error> extends CheckError<"and"> {
  readonly branch: AndBranch<E1, E2>

  constructor(branch: AndBranch<E1, E2>) {
    super(branch.error.message, {
      code: "and",
      context: { branch: branch.tag },
      cause: branch.error,
    })
    this.branch = branch
  }

  static err1<E1 extends Error, E2 extends Error>(error: E1): AndError<E1, E2> {
    return new AndError<E1, E2>({ tag: "err1", error })
  }

  static err2<E1 extends Error, E2 extends Error>(error: E2): AndError<E1, E2> {
    return new AndError<E1, E2>({ tag: "err2", error })
  }
}

/**
 * Both checks must hold. `first` runs first; `second` is skipped when it
 * fails.
 */
export function and<E1 extends Error, N1 extends string, E2 extends Error, N2 extends string>(
  first: Check<E1, N1>,
  second: Check<E2, N2>,
): Check<AndError<E1, E2>, `And<${N1}, ${N2}>`> {
  return {
    name: `And<${first.name}, ${second.name}>`,
    check(value) {
      const left = first.check(value)
      if (!left.success) return err(AndError.err1<E1, E2>(left.error))

      const right = second.check(value)
      if (!right.success) return err(AndError.err2<E1, E2>(right.error))

      return passed
    },
  }
}
