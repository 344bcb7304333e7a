const CAPACITY = 16
const LONE_SURROGATE = /\p{Cs}/u

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Fixed 16-byte inline buffer holding a short string as UTF-8.
 *
 * Bytes past `byteLength` are never read.
 */
export class SmallString {
  static readonly CAPACITY = CAPACITY

  private decoded: string | undefined

  private constructor(
    private readonly bytes: Uint8Array,
    readonly byteLength: number,
  ) {}

  /**
   * Returns `undefined` when the value needs more than 16 bytes, or holds a
   * lone surrogate that UTF-8 cannot represent.
   */
  static tryFrom(value: string): SmallString | undefined {
    // UTF-8 never takes fewer bytes than UTF-16 code units
    if (value.length > CAPACITY || LONE_SURROGATE.test(value)) return undefined

    const bytes = new Uint8Array(CAPACITY)
    const { read, written } = encoder.encodeInto(value, bytes)
    if (read !== value.length) return undefined

    return new SmallString(bytes, written)
  }

  asStr(): string {
    this.decoded ??= decoder.decode(this.bytes.subarray(0, this.byteLength))

    return this.decoded
  }
}
