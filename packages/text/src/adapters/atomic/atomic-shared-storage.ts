import { storageReleased } from "../../core/errors/invariant-error"
import { err, ok } from "../../core/result"
import { intoString } from "../../core/storage/storage"
import type { Result } from "../../ports/result"
import type { DynamicStorage, StorageStrategy } from "../../ports/storage"

const DECODE_CHUNK = 4096

/**
 * Everything another thread needs to adopt a handle. Safe to post through
 * a `MessagePort` or `Worker#postMessage`.
 */
export type AtomicSharedDescriptor = Readonly<{
  /** UTF-16 code units of the text */
  units: SharedArrayBuffer
  /** One Int32 reference count */
  refs: SharedArrayBuffer
}>

type AtomicState = {
  units: Uint16Array
  refs: Int32Array
  descriptor: AtomicSharedDescriptor
  decoded: string | undefined
}

function decode(units: Uint16Array): string {
  let out = ""
  for (let offset = 0; offset < units.length; offset += DECODE_CHUNK) {
    out += String.fromCharCode(...units.subarray(offset, offset + DECODE_CHUNK))
  }

  return out
}

/**
 * Reference-counted storage whose buffer and count live in
 * `SharedArrayBuffer`s, so handles can be shared across worker threads.
 * The count is only touched through `Atomics`.
 */
export class AtomicSharedStorage implements DynamicStorage {
  readonly strategy = "atomic"
  private state: AtomicState | undefined

  private constructor(descriptor: AtomicSharedDescriptor, decoded?: string) {
    this.state = {
      units: new Uint16Array(descriptor.units),
      refs: new Int32Array(descriptor.refs),
      descriptor,
      decoded,
    }
  }

  static create(value: string): AtomicSharedStorage {
    const descriptor = {
      units: new SharedArrayBuffer(value.length * 2),
      refs: new SharedArrayBuffer(4),
    }

    const units = new Uint16Array(descriptor.units)
    for (let i = 0; i < value.length; i++) {
      units[i] = value.charCodeAt(i)
    }
    Atomics.store(new Int32Array(descriptor.refs), 0, 1)

    return new AtomicSharedStorage(descriptor, value)
  }

  /**
   * Take ownership of a handle produced by {@link AtomicSharedStorage.share}.
   * Each descriptor must be adopted exactly once.
   */
  static adopt(descriptor: AtomicSharedDescriptor): AtomicSharedStorage {
    return new AtomicSharedStorage(descriptor)
  }

  get refCount(): number {
    return Atomics.load(this.live().refs, 0)
  }

  sharesBufferWith(other: AtomicSharedStorage): boolean {
    return (
      other.state !== undefined && other.state.descriptor.units === this.live().descriptor.units
    )
  }

  asStr(): string {
    const state = this.live()
    state.decoded ??= decode(state.units)

    return state.decoded
  }

  retain(): AtomicSharedStorage {
    const state = this.live()
    Atomics.add(state.refs, 0, 1)

    return new AtomicSharedStorage(state.descriptor, state.decoded)
  }

  /**
   * Create a new reference for another thread. The count is incremented
   * here; the receiver adopts it with {@link AtomicSharedStorage.adopt}.
   */
  share(): AtomicSharedDescriptor {
    const state = this.live()
    Atomics.add(state.refs, 0, 1)

    return state.descriptor
  }

  tryExtractString(): Result<string, this> {
    const state = this.live()
    if (Atomics.compareExchange(state.refs, 0, 1, 0) !== 1) return err(this)

    const value = this.asStr()
    this.state = undefined

    return ok(value)
  }

  release(): void {
    const state = this.live()
    Atomics.sub(state.refs, 0, 1)
    this.state = undefined
  }

  private live(): AtomicState {
    if (this.state === undefined) throw storageReleased(this.strategy)

    return this.state
  }
}

export const atomicShared: StorageStrategy<AtomicSharedStorage> = {
  name: "atomic",
  fromString: (value) => AtomicSharedStorage.create(value),
  from: (other) =>
    other instanceof AtomicSharedStorage ? other : AtomicSharedStorage.create(intoString(other)),
  clone: (storage) => storage.retain(),
}
