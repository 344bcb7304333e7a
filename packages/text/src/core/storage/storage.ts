import type { MaybeOwned } from "../../ports/maybe-owned"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"

export function fromStr<S extends DynamicStorage>(
  strategy: StorageStrategy<S>,
  value: string,
): S {
  return strategy.fromStr ? strategy.fromStr(value) : strategy.fromString(value)
}

export function fromCow<S extends DynamicStorage>(
  strategy: StorageStrategy<S>,
  value: MaybeOwned<string>,
): S {
  if (strategy.fromCow) return strategy.fromCow(value)

  return value.type === "owned" ? strategy.fromString(value.value) : fromStr(strategy, value.value)
}

/**
 * Move `other` into `strategy`. Without an override, the other handle's
 * string is extracted (or copied) and adopted.
 */
export function fromStorage<S extends DynamicStorage>(
  strategy: StorageStrategy<S>,
  other: DynamicStorage,
): S {
  if (strategy.from) return strategy.from(other)

  return strategy.fromString(intoString(other))
}

/**
 * Consume a handle and return its string: extracted when the handle is the
 * sole owner, copied otherwise. The handle is released either way.
 */
export function intoString(storage: DynamicStorage): string {
  const extracted = storage.tryExtractString()
  if (extracted.success) return extracted.value

  const copy = extracted.error.asStr()
  extracted.error.release()

  return copy
}
