import { BaseError } from "@textkind/errors"
import { exclusive } from "../../../adapters/exclusive/exclusive-storage"
import { thrown } from "../../../tests/utils/thrown"
import { unwrap, unwrapErr } from "../../../tests/utils/result"
import { ConvertError } from "../../errors/convert-error"
import { InvariantError } from "../../errors/invariant-error"
import { TextError, TextErrorWithValue } from "../../errors/text-error"
import { Identifier, IdentifierLax, Title } from "../../kinds/predefined"
import { Text } from "../../text/text"
import { err, ok } from "../../result"
import { type TryConverter, defineConverter, defineTryConverter } from "../converter"

const identifierToLax = defineConverter(Identifier, IdentifierLax)
const laxToIdentifier = defineConverter(IdentifierLax, Identifier)
const titleToIdentifier = defineTryConverter(Title, Identifier)

describe("defineConverter", () => {
  it("converts into a superset kind", () => {
    const identifier = unwrap(Text.tryFromStr(Identifier, exclusive, "snake_case"))
    const lax = identifierToLax.convert(identifier)

    expect(lax.kind).toBe(IdentifierLax)
    expect(lax.asStr()).toBe("snake_case")
    expect(identifier.isMoved).toBe(true)
  })

  it("is reachable from the text", () => {
    const identifier = unwrap(Text.tryFromStr(Identifier, exclusive, "into"))

    expect(identifier.convertInto(identifierToLax).kind).toBe(IdentifierLax)
  })

  it("throws an InvariantError when the superset promise is broken", () => {
    const lax = unwrap(Text.tryFromStr(IdentifierLax, exclusive, "9lives"))
    const error = thrown(() => laxToIdentifier.convert(lax))

    expect(error).toBeInstanceOf(InvariantError)
    expect(error).toMatchObject({
      code: "invariant_violation",
      isOperational: false,
      message: "converting IdentifierLax to Identifier produced an invalid identifier",
    })
    expect(error instanceof InvariantError && error.cause).toBeInstanceOf(TextError)
  })
})

describe("defineTryConverter", () => {
  it("converts accepted texts", () => {
    const title = unwrap(Text.tryFromStr(Title, exclusive, "Accepted"))

    expect(unwrap(title.tryConvertInto(titleToIdentifier)).asStr()).toBe("Accepted")
  })

  it("bundles the failure with the untouched source", () => {
    const title = unwrap(Text.tryFromStr(Title, exclusive, "Two words"))
    const error = unwrapErr(titleToIdentifier.tryConvert(title))

    expect(error).toBeInstanceOf(ConvertError)
    expect(error.code).toBe("conversion_failed")
    expect(error.message).toBe("invalid identifier")
    expect(error.context).toEqual({ source: "Title" })
    expect(error.text).toBe(title)
    expect(error.error.kind).toBe(Identifier)
    expect(title.asStr()).toBe("Two words")
  })
})

describe("custom try converters", () => {
  class ReservedWordError extends BaseError<"reserved_word"> {}

  const reserved = new Set(["class", "import"])
  const identifierToPlainTitle = defineConverter(Identifier, Title)

  const identifierToTitle: TryConverter<Identifier, Title, ReservedWordError> = {
    source: Identifier,
    target: Title,
    tryConvert(text) {
      if (reserved.has(text.asStr())) {
        return err(
          new ConvertError(new ReservedWordError("reserved word", { code: "reserved_word" }), text),
        )
      }

      return ok(identifierToPlainTitle.convert(text))
    },
  }

  it("reports the converter's own error with the source text", () => {
    const identifier = unwrap(Text.tryFromStr(Identifier, exclusive, "class"))
    const error = unwrapErr(identifier.tryConvertInto(identifierToTitle))

    expect(error.message).toBe("reserved word")
    expect(error.error).toBeInstanceOf(ReservedWordError)
    expect(error.text.asStr()).toBe("class")
  })

  it("passes other identifiers through", () => {
    const identifier = unwrap(Text.tryFromStr(Identifier, exclusive, "klass"))
    const title = unwrap(identifier.tryConvertInto(identifierToTitle))

    expect(title.kind).toBe(Title)
    expect(title.asStr()).toBe("klass")
  })
})

describe("ConvertError interop", () => {
  it("turns into an error carrying the source text and back", () => {
    const title = unwrap(Text.tryFromStr(Title, exclusive, "Two words"))
    const convertError = unwrapErr(titleToIdentifier.tryConvert(title))

    const withValue = convertError.intoErrorWithValue()
    expect(withValue).toBeInstanceOf(TextErrorWithValue)
    expect(withValue.value).toBe(title)
    expect(withValue.kind).toBe(Identifier)

    const back = ConvertError.fromErrorWithValue(withValue)
    expect(back.text).toBe(title)
    expect(back.error.equals(convertError.error)).toBe(true)
  })
})
