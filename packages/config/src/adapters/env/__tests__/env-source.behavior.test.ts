import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("reads TEXTKIND_ variables by default and strips the prefix", async () => {
    const source = new EnvSource({
      env: { TEXTKIND_STORAGE: "atomic", TEXTKIND_LOG_PRETTY: "true", PATH: "/usr/bin" },
    })

    expect(await source.load()).toEqual({ STORAGE: "atomic", LOG_PRETTY: "true" })
    expect(source.locate("STORAGE")).toBe("env TEXTKIND_STORAGE")
  })

  it("takes a custom prefix", async () => {
    const source = new EnvSource({
      prefix: "APP_TEXT_",
      env: { APP_TEXT_STORAGE: "shared", TEXTKIND_STORAGE: "atomic" },
    })

    expect(await source.load()).toEqual({ STORAGE: "shared" })
    expect(source.locate("STORAGE")).toBe("env APP_TEXT_STORAGE")
  })

  it("trims values and skips unset variables", async () => {
    const source = new EnvSource({
      env: { TEXTKIND_STORAGE: "  shared\n", TEXTKIND_LOG_LEVEL: undefined },
    })

    expect(await source.load()).toEqual({ STORAGE: "shared" })
  })
})
