import type { Check } from "../../../ports/check"
import { passed } from "../../result"
import { AndError, and } from "../and"
import { NoControlError } from "../no-control"
import { NotEmpty, NotEmptyError } from "../not-empty"
import { NoWhitespace, NoWhitespaceError } from "../no-whitespace"
import { TitleCheck } from "../title"
import { TrimmedError } from "../trimmed"
import { WhenTrimmedError, whenTrimmed } from "../when-trimmed"
import { IdentifierCheck } from "../identifier"

describe("and", () => {
  it("derives its name from both operands", () => {
    expect(and(NotEmpty, NoWhitespace).name).toBe("And<NotEmpty, NoWhitespace>")
  })

  it("passes when both checks pass", () => {
    expect(and(NotEmpty, NoWhitespace).check("abc").success).toBe(true)
  })

  it("reports the first check's error as err1", () => {
    const result = and(NotEmpty, NoWhitespace).check("")

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error).toBeInstanceOf(AndError)
    expect(result.error.branch.tag).toBe("err1")
    expect(result.error.branch.error).toBeInstanceOf(NotEmptyError)
    expect(result.error.message).toBe("value is empty")
    expect(result.error.context).toEqual({ branch: "err1" })
  })

  it("reports the second check's error as err2", () => {
    const result = and(NotEmpty, NoWhitespace).check("a b")

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error.branch.tag).toBe("err2")
    expect(result.error.branch.error).toBeInstanceOf(NoWhitespaceError)
    expect(result.error.cause).toBe(result.error.branch.error)
  })

  it("skips the second check when the first fails", () => {
    const second: Check<NotEmptyError, "Second"> = {
      name: "Second",
      check: vi.fn(() => passed),
    }

    and(NotEmpty, second).check("")

    expect(second.check).not.toHaveBeenCalled()
  })
})

describe("whenTrimmed", () => {
  it("runs the inner check on the trimmed value", () => {
    const check = whenTrimmed(IdentifierCheck)

    expect(check.name).toBe("WhenTrimmed<Identifier>")
    expect(check.check("  foo_bar \n").success).toBe(true)
  })

  it("wraps the inner error", () => {
    const result = whenTrimmed(NotEmpty).check("   ")

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error).toBeInstanceOf(WhenTrimmedError)
    expect(result.error.error).toBeInstanceOf(NotEmptyError)
    expect(result.error.code).toBe("when_trimmed")
    expect(result.error.message).toBe("value is empty when trimmed")
  })
})

describe("TitleCheck", () => {
  it("accepts a plain title", () => {
    expect(TitleCheck.check("Quarterly report").success).toBe(true)
  })

  it("rejects empty values through the first branch", () => {
    const result = TitleCheck.check("")

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.branch.tag).toBe("err1")
    }
  })

  it("rejects control characters before looking at whitespace", () => {
    const result = TitleCheck.check(" bell\u0007 ")

    expect(result.success).toBe(false)
    if (result.success) return

    const { branch } = result.error
    expect(branch.tag).toBe("err2")
    if (branch.tag !== "err2") return

    expect(branch.error.branch.tag).toBe("err1")
    expect(branch.error.branch.error).toBeInstanceOf(NoControlError)
    expect(result.error.message).toBe("value contains 1 control character(s)")
  })

  it("rejects untrimmed values", () => {
    const result = TitleCheck.check("Title ")

    expect(result.success).toBe(false)
    if (result.success) return

    const { branch } = result.error
    if (branch.tag !== "err2") throw new Error("expected err2")

    expect(branch.error.branch.tag).toBe("err2")
    expect(branch.error.branch.error).toBeInstanceOf(TrimmedError)
    expect(result.error.message).toBe("value has whitespace at the end")
  })
})
