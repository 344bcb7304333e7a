import type { Result } from "../../ports/result"

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.success) throw new Error("expected success", { cause: result.error })

  return result.value
}

export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.success) throw new Error("expected failure")

  return result.error
}
