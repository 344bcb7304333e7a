/**
 * A value that is either borrowed from the caller or handed over to the
 * callee.
 *
 * Borrowed values are kept as-is where possible (static data); owned values
 * may be adopted by a storage strategy without copying.
 */
export type MaybeOwned<T> =
  | { readonly type: "borrowed"; readonly value: T }
  | { readonly type: "owned"; readonly value: T }
