import { storageReleased } from "../../core/errors/invariant-error"
import { err, ok } from "../../core/result"
import { intoString } from "../../core/storage/storage"
import type { Result } from "../../ports/result"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"

type SharedBox = {
  value: string
  refs: number
}

/**
 * Reference-counted storage for use within one thread.
 *
 * Clones share one buffer; the buffer can be extracted only by the last
 * remaining handle.
 */
export class SharedStorage implements DynamicStorage {
  readonly strategy = "shared"
  private box: SharedBox | undefined

  private constructor(box: SharedBox) {
    this.box = box
  }

  static create(value: string): SharedStorage {
    return new SharedStorage({ value, refs: 1 })
  }

  get refCount(): number {
    return this.live().refs
  }

  sharesBufferWith(other: SharedStorage): boolean {
    return other.box !== undefined && other.box === this.box
  }

  asStr(): string {
    return this.live().value
  }

  retain(): SharedStorage {
    const box = this.live()
    box.refs += 1

    return new SharedStorage(box)
  }

  tryExtractString(): Result<string, this> {
    const box = this.live()
    if (box.refs !== 1) return err(this)

    box.refs = 0
    this.box = undefined

    return ok(box.value)
  }

  release(): void {
    const box = this.live()
    box.refs -= 1
    this.box = undefined
  }

  private live(): SharedBox {
    if (this.box === undefined) throw storageReleased(this.strategy)

    return this.box
  }
}

export const shared: StorageStrategy<SharedStorage> = {
  name: "shared",
  fromString: (value) => SharedStorage.create(value),
  from: (other) =>
    other instanceof SharedStorage ? other : SharedStorage.create(intoString(other)),
  clone: (storage) => storage.retain(),
}
