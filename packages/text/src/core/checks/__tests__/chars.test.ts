import { escapeChar, isOnlyWhitespace, trimWhitespace } from "../chars"

describe("escapeChar", () => {
  it("keeps printable ASCII", () => {
    expect(escapeChar("a")).toBe("a")
    expect(escapeChar("-")).toBe("-")
    expect(escapeChar(" ")).toBe(" ")
  })

  it("uses backslash escapes for quotes, backslash and line breaks", () => {
    expect(escapeChar("\t")).toBe("\\t")
    expect(escapeChar("\r")).toBe("\\r")
    expect(escapeChar("\n")).toBe("\\n")
    expect(escapeChar("'")).toBe("\\'")
    expect(escapeChar('"')).toBe('\\"')
    expect(escapeChar("\\")).toBe("\\\\")
  })

  it("renders everything else as a unicode escape", () => {
    expect(escapeChar("\u007f")).toBe("\\u{7f}")
    expect(escapeChar("é")).toBe("\\u{e9}")
    expect(escapeChar("😀")).toBe("\\u{1f600}")
  })
})

describe("trimWhitespace", () => {
  it("strips unicode whitespace on both sides", () => {
    expect(trimWhitespace("  x y  \n")).toBe("x y")
  })

  it("keeps a byte order mark, which is not whitespace", () => {
    expect(trimWhitespace("\ufeffx")).toBe("\ufeffx")
  })
})

describe("isOnlyWhitespace", () => {
  it("is false for the empty string", () => {
    expect(isOnlyWhitespace("")).toBe(false)
  })

  it("is true for whitespace of any kind", () => {
    expect(isOnlyWhitespace(" \t\u3000")).toBe(true)
  })
})
