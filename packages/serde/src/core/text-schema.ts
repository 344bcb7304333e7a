import type { AnyKind, DynamicStorage, TextFactory } from "@textkind/text"
import { z } from "zod"
import { describeTextError } from "./deserialize-error"

/**
 * Zod schema parsing a string into a text of the factory's kind.
 *
 * @example
 * ```ts
 * const Payload = z.object({ title: textSchema(defineText(Title, exclusive)) })
 *
 * Payload.parse({ title: "Minutes" }).title.asStr() // "Minutes"
 * ```
 */
export function textSchema<K extends AnyKind, S extends DynamicStorage>(
  factory: TextFactory<K, S>,
) {
  return z.string().transform((value, ctx) => {
    const result = factory.tryFromString(value)
    if (result.success) return result.value

    ctx.issues.push({
      code: "custom",
      message: describeTextError(result.error),
      input: value,
    })

    return z.NEVER
  })
}
