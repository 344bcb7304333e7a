import {
  Trimmed,
  TrimmedBothError,
  TrimmedError,
  TrimmedLeft,
  TrimmedLeftError,
  TrimmedOnlyError,
  TrimmedRight,
  TrimmedRightError,
} from "../trimmed"

function trimmedFailure(value: string): TrimmedError {
  const result = Trimmed.check(value)
  if (result.success) throw new Error(`expected "${value}" to be rejected`)

  return result.error
}

describe("TrimmedLeft / TrimmedRight", () => {
  it("only look at their own side", () => {
    expect(TrimmedLeft.check("a ").success).toBe(true)
    expect(TrimmedRight.check(" a").success).toBe(true)
  })

  it("report leading and trailing whitespace", () => {
    const left = TrimmedLeft.check(" a")
    const right = TrimmedRight.check("a ")

    expect(left.success).toBe(false)
    expect(right.success).toBe(false)
    if (!left.success) {
      expect(left.error).toBeInstanceOf(TrimmedLeftError)
      expect(left.error.message).toBe("value has whitespace at the beginning")
    }
    if (!right.success) {
      expect(right.error).toBeInstanceOf(TrimmedRightError)
      expect(right.error.message).toBe("value has whitespace at the end")
    }
  })
})

describe("Trimmed", () => {
  it("accepts trimmed and empty values", () => {
    expect(Trimmed.check("a b").success).toBe(true)
    expect(Trimmed.check("").success).toBe(true)
  })

  it("reports a single side", () => {
    const left = trimmedFailure(" a")
    const right = trimmedFailure("a\t")

    expect(left.side).toBe("left")
    expect(left.cause).toBeInstanceOf(TrimmedLeftError)
    expect(right.side).toBe("right")
    expect(right.cause).toBeInstanceOf(TrimmedRightError)
  })

  it("reports both sides together", () => {
    const error = trimmedFailure("  Foo  ")

    expect(error).toBeInstanceOf(TrimmedError)
    expect(error.side).toBe("both")
    expect(error.failure.error).toBeInstanceOf(TrimmedBothError)
    expect(error.message).toBe("value has whitespace at beginning and end")
    expect(error.context).toEqual({ side: "both" })
  })

  it("reports only-whitespace values as such, never as a side", () => {
    for (const value of [" ", "   ", "\n\t "]) {
      const error = trimmedFailure(value)

      expect(error.side).toBe("only")
      expect(error.failure.error).toBeInstanceOf(TrimmedOnlyError)
      expect(error.message).toBe("value contains only whitespace characters")
    }
  })
})
