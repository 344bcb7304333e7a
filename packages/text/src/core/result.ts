import type { Failure, Success } from "../ports/result"

export const ok = <T>(value: T): Success<T> => ({ success: true, value })

export const err = <E>(error: E): Failure<E> => ({ success: false, error })

export const passed: Success<void> = { success: true, value: undefined }
