import type { MaybeOwned } from "../ports/maybe-owned"

export const borrowed = <T>(value: T): MaybeOwned<T> => ({ type: "borrowed", value })

export const owned = <T>(value: T): MaybeOwned<T> => ({ type: "owned", value })
