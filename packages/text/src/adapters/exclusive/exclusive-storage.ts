import { storageReleased } from "../../core/errors/invariant-error"
import { ok } from "../../core/result"
import type { Result } from "../../ports/result"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"

/**
 * Single-owner storage. Extraction always succeeds.
 */
export class ExclusiveStorage implements DynamicStorage {
  readonly strategy = "exclusive"
  private value: string | undefined

  constructor(value: string) {
    this.value = value
  }

  asStr(): string {
    return this.live()
  }

  tryExtractString(): Result<string, this> {
    const value = this.live()
    this.value = undefined

    return ok(value)
  }

  release(): void {
    this.live()
    this.value = undefined
  }

  private live(): string {
    if (this.value === undefined) throw storageReleased(this.strategy)

    return this.value
  }
}

export const exclusive: StorageStrategy<ExclusiveStorage> = {
  name: "exclusive",
  fromString: (value) => new ExclusiveStorage(value),
  clone: (storage) => new ExclusiveStorage(storage.asStr()),
}
