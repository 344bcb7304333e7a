import { createNullLogger, type Logger } from "@textkind/logger"
import type { AnyKind, DynamicStorage, Text, TextFactory } from "@textkind/text"
import type { Codec } from "../ports/codec"
import { DeserializeError, describeJsonType, describeTextError } from "./deserialize-error"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export type TextCodecOptions = {
  logger?: Logger
}

/**
 * JSON codec for texts of one kind.
 *
 * Encoding writes the bare JSON string. Decoding parses a JSON string,
 * wraps it in the factory's storage and validates it; every failure throws a
 * {@link DeserializeError}.
 */
export function textCodec<K extends AnyKind, S extends DynamicStorage>(
  factory: TextFactory<K, S>,
  options: TextCodecOptions = {},
): Codec<Text<K, S>> {
  const logger = (options.logger ?? createNullLogger()).child({
    module: "serde",
    kind: factory.kind.name,
    storage: factory.strategy.name,
  })

  function parse(bytes: Uint8Array): unknown {
    try {
      return JSON.parse(decoder.decode(bytes))
    } catch (error) {
      logger.debug("rejected malformed payload", { operation: "decode", err: error })

      throw new DeserializeError("payload is not valid JSON", {
        code: "invalid_json",
        context: { kind: factory.kind.name },
        cause: error,
      })
    }
  }

  return {
    encode(value) {
      logger.trace("encoding text", { operation: "encode" })

      return encoder.encode(JSON.stringify(value.asStr()))
    },

    decode(bytes) {
      const parsed = parse(bytes)

      if (typeof parsed !== "string") {
        const found = describeJsonType(parsed)
        logger.debug("rejected non-string payload", { operation: "decode", found })

        throw new DeserializeError(`invalid type: expected a string, found ${found}`, {
          code: "invalid_json_type",
          context: { kind: factory.kind.name, found },
        })
      }

      const result = factory.tryFromDynamic(factory.strategy.fromString(parsed))
      if (result.success) return result.value

      const [error, storage] = result.error.split()
      storage.release()
      logger.debug("rejected invalid text", {
        operation: "decode",
        check: factory.kind.check.name,
        err: error,
      })

      throw new DeserializeError(describeTextError(error), {
        code: "invalid_text",
        context: { kind: factory.kind.name, check: factory.kind.check.name },
        cause: error,
      })
    },
  }
}
