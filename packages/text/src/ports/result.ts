export type Success<T> = {
  readonly success: true
  readonly value: T
}

export type Failure<E> = {
  readonly success: false
  readonly error: E
}

/**
 * Outcome of a fallible operation. Failures are values, never thrown.
 */
export type Result<T, E> = Success<T> | Failure<E>
