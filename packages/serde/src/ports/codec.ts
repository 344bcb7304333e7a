/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs must be deterministic. `decode` may reject bytes that do not
 * describe a valid `T`; it throws in that case.
 *
 * @example
 * ```ts
 * const codec: Codec<Text<Title, ExclusiveStorage>> = textCodec(defineText(Title, exclusive))
 *
 * const bytes = codec.encode(title)      // UTF-8 of "\"Release notes\""
 * const again = codec.decode(bytes)      // Text<Title, ExclusiveStorage>
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
