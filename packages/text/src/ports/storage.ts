import type { MaybeOwned } from "./maybe-owned"
import type { Result } from "./result"

/**
 * A handle to heap-held text under some ownership strategy.
 *
 * @remarks
 * Handles are consumed by extraction and release. Any use of a consumed
 * handle throws an `InvariantError` with code `storage_released`.
 */
export interface DynamicStorage {
  /** Name of the strategy that produced this handle */
  readonly strategy: string

  asStr(): string

  /**
   * Reclaim the underlying string without copying.
   *
   * Succeeds only when this handle is the sole owner; the handle is
   * consumed on success. On failure the same handle is returned untouched
   * and stays usable.
   */
  tryExtractString(): Result<string, this>

  /**
   * Give up this handle. Refcounted strategies decrement their count.
   */
  release(): void
}

/**
 * Creates and clones handles of one storage type.
 *
 * Only `fromString` and `clone` are required. The optional constructors let
 * a strategy skip an intermediate copy; the free functions in
 * `core/storage/storage.ts` fall back to `fromString` when they are absent.
 */
export interface StorageStrategy<S extends DynamicStorage> {
  readonly name: string

  /** Adopt an owned string */
  fromString(value: string): S

  fromStr?(value: string): S

  fromCow?(value: MaybeOwned<string>): S

  /**
   * Build a handle from a handle of any strategy. The other handle is
   * consumed.
   */
  from?(other: DynamicStorage): S

  clone(storage: S): S
}
