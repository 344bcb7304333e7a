import { MaxBytesError } from "../../checks/max-bytes"
import { NotEmpty } from "../../checks/not-empty"
import { defineKind, validate } from "../kind"
import { Identifier, IdentifierLax, Title } from "../predefined"

describe("predefined kinds", () => {
  it("carry their names, descriptions and checks", () => {
    expect(Title.name).toBe("Title")
    expect(Title.description).toBe("title")
    expect(Title.check.name).toBe("And<MaxBytes512, Title>")

    expect(Identifier.description).toBe("identifier")
    expect(Identifier.check.name).toBe("And<MaxBytes512, Identifier>")

    expect(IdentifierLax.description).toBe("identifier")
    expect(IdentifierLax.check.name).toBe("And<MaxBytes512, IdentifierLax>")
  })

  it("enforce the byte ceiling before the content check", () => {
    const result = validate(Identifier, "a".repeat(513))

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error.branch.tag).toBe("err1")
    expect(result.error.branch.error).toBeInstanceOf(MaxBytesError)
  })

  it("validate passes accepted values", () => {
    expect(validate(Title, "Hello").success).toBe(true)
    expect(validate(IdentifierLax, "hello-world").success).toBe(true)
  })
})

describe("defineKind", () => {
  it("returns a frozen kind", () => {
    const Label = defineKind({ name: "Label", description: "label", check: NotEmpty })

    expect(Object.isFrozen(Label)).toBe(true)
    expect(Label.check).toBe(NotEmpty)
    expect(validate(Label, "").success).toBe(false)
  })
})
